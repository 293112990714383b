export * from "./price";
export * from "./service";
export { runListingSweep, startListingSweeper, stopListingSweeper } from "./scheduler";
export * from "./attachments";
