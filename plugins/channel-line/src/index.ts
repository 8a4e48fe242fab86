export { LineNotifier, createLineNotifier, LINE_PUSH_URL, LINE_BROADCAST_URL, DRY_RUN_RESULT } from "./notifier.js";
export { loadLineConfig, missingCredential } from "./config.js";
export type { LineConfig, LineRoute } from "./config.js";
