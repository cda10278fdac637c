/**
 * Service contracts for the Inkstand server
 *
 * Services depend on these interfaces so each can be replaced by a test
 * double.
 */

export * from "./IRasterizer";
export * from "./IWatermarkService";
export * from "./IMonochromeEncoder";
export * from "./IImageStore";
export * from "./ILatestImageRegister";
export * from "./IDeviceDirectory";
export * from "./IRuntimeSettings";
export * from "./IScreenService";
export * from "./IScreenScheduler";
export * from "./IWebInterfaceService";
