/**
 * Central export for utilities
 */

export { stripCodeFence, type FenceStripResult } from "./code-fence.utils";
export { formatTimestamp } from "./date.utils";
export { formatErrorMessage, readStatusCode, readErrorCode } from "./error.utils";
