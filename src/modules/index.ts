/**
 * Pipeline modules export
 */

export { initialize } from "./workspace";
export { generate } from "./pipeline";
export { assemble } from "./assemble";
export { simulate } from "./simulate";
export { stats } from "./stats";
