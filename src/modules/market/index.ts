export * from "./deps";
export * from "./presenter";
export * from "./services";
export * from "./types";
