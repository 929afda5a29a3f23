export { MemoryResumeWriter, FileResumeWriter, type ResumeWriter } from "./resume.js";
export { QuotaAwareBatchLookup, type QuotaAwareBatchLookupOptions } from "./runner.js";
export { FileRecordSink, MemoryRecordSink, type RecordSink } from "./sink.js";
export type { BatchProgress, RunState, RunSummary } from "./types.js";
export { parseWordList, readWordList } from "./word-list.js";
