/**
 * Test doubles for code that logs through relaylog: `MemorySink` keeps every
 * written line in an array, and a recording terminator stands in for the
 * emergency exit so `emergency()` can be asserted on without ending the run.
 */
export { MemorySink } from "./testing/memory-sink.js";
export type { RecordingTerminator } from "./testing/recording-terminator.js";
export { createRecordingTerminator } from "./testing/recording-terminator.js";
