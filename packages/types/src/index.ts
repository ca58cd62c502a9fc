export * from "./health";
export * from "./time";
