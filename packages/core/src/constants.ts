/**
 * Constants and the built-in deployment descriptor
 */

import type { FunctionDescriptor } from "./types";

/** External tool that performs the deployment */
export const DEPLOY_COMMAND = "gcloud";

/** Optional project manifest, looked up from the working directory upwards */
export const MANIFEST_FILE = "fndeploy.yaml";

/** Storage trigger event fired when an object is finalized in a bucket */
export const OBJECT_FINALIZE_EVENT = "google.storage.object.finalize";

/**
 * Descriptor deployed when no fndeploy.yaml is present:
 * acknowledges FITS files uploaded to the survey bucket.
 */
export const DEFAULT_FUNCTION: FunctionDescriptor = Object.freeze({
  name: "ack-fits-received",
  entryPoint: "ack_fits_received",
  runtime: "python37",
  triggerResource: "panoptes-survey",
  triggerEvent: OBJECT_FINALIZE_EVENT,
});

/** Runtime tags Cloud Functions has decommissioned */
export const DEPRECATED_RUNTIMES: readonly string[] = [
  "nodejs6",
  "nodejs8",
  "nodejs10",
  "python37",
  "go111",
  "go113",
  "ruby26",
  "php74",
];

export function isDeprecatedRuntime(runtime: string): boolean {
  return DEPRECATED_RUNTIMES.includes(runtime);
}
