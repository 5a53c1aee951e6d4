/**
 * Core types for the hotspot GPS logger
 */
export * from "./ResultTypes";
export * from "./FixTypes";
export * from "./LoggingTypes";
export * from "./StreamTypes";
export * from "./ConfigTypes";
