export { ConsoleTransport, type ConsoleTransportOptions } from "./console.js";
export { CountingTransport } from "./counting.js";
export { FileTransport, type FileTransportOptions } from "./file.js";
