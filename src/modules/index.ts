/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { register } from "./registry";
export { validate } from "./validator";
export { merge } from "./merger";
export { report } from "./report";
