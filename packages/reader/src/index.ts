export { compileDeclarations, readDeclarations } from "./read-declarations.js";
export type { ReadDeclarationsOptions } from "./read-declarations.js";
