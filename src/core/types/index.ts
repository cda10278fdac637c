/**
 * Core types for the Inkstand device server
 *
 * This barrel file exports all type definitions used throughout the application.
 */
export * from "./ResultTypes";
export * from "./ConfigTypes";
export * from "./CanvasTypes";
export * from "./DeviceTypes";
export * from "./ApiTypes";
