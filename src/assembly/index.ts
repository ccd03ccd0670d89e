export {
  assembleDocument,
  buildIndexDocument,
  MissingSectionError,
  type AssemblyOptions,
  type AssembleResult,
  type IndexEntry,
  type IndexOptions,
} from "./assembler.js";
export { FileSystemSink, MemorySink, type DocumentSink } from "./output.js";
