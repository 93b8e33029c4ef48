export { InMemoryStore } from "./in-memory-store";
export { RecordingLogger } from "./recording-logger";
export type { LogRecord } from "./recording-logger";
