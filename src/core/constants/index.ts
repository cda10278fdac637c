export * from "./defaults";
