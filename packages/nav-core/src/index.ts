export * from "./types/objects";
export * from "./types/observation";
export * from "./catalog/waypoints";
export * from "./filters/detectionStabilizer";
export * from "./announce/announcementGate";
export * from "./announce/phrases";
export * from "./navigation/config";
export * from "./navigation/types";
export * from "./navigation/navigationReducer";
export * from "./proximity/proximityMonitor";
export * from "./scene/sceneQueries";
export * from "./runtime/ports";
export * from "./runtime/timers";
export * from "./runtime/serialMailbox";
export * from "./runtime/NavigationEngine";
export * from "./commands/voiceCommands";
