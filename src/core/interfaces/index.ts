export * from "./IFixStore";
export * from "./IDeviceConnector";
export * from "./ILocationRepository";
export * from "./IScheduledTask";
export * from "./IWebInterfaceService";
