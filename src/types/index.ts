export * from "./auth";
export * from "./http";
export * from "./vehicle";
export * from "./telemetry";
export * from "./pairing";
export * from "./key";
export * from "./polling";
