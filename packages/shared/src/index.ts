export * from "./types";
export * from "./errors";
export * from "./defaults";
export * from "./story";
export * from "./captions/segmenter";
export * from "./captions/srt";
export * from "./scriptCleanup/cleanup";
