export { createJsHost } from "./host.js";
export type { JsHost, JsHostOptions } from "./host.js";
export {
  CHAR_INSIGHT,
  bigintWidth,
  createJsFrontend,
  integerWidth,
} from "./frontend.js";
export { registerStandardTypes } from "./standard-types.js";
export type { StandardTypes } from "./standard-types.js";
export { registerStandardConversions } from "./standard-conversions.js";
export {
  createMsgPackBridge,
  decodeOutcome,
  encodeArguments,
} from "./bridge.js";
export type { CallOutcome, MsgPackBridge } from "./bridge.js";
export { ManifestError, loadManifest } from "./manifest.js";
