export { RecordingListener } from "./recordingListener.js";
export { StubBackend } from "./stubBackend.js";
export type { StubBackendOptions, StubCall } from "./stubBackend.js";
