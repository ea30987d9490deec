/**
 * Utils barrel exports
 */

export * from "./template/template";
export * from "./paths";
export * from "./resource";
export * from "./sheets/sheetsHelpers";
