/**
 * Schema exports
 */

export * from "./event.schema.js";
export * from "./request.schema.js";
