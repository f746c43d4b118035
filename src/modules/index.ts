/**
 * Pipeline modules export
 */

export { fill, submit } from "./form";
export { trigger } from "./trigger";
export { relocate } from "./migrator";
export { stats } from "./stats";
