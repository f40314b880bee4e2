/**
 * STRUCTURE format module exports
 *
 * @module structure
 */

export type { StructureRow, StructureWriterOptions } from "./types";
export { StructureWriter } from "./writer";
