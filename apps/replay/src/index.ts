export * from "./trace";
export * from "./configFile";
export * from "./recordingSpeechSink";
export * from "./replay";
