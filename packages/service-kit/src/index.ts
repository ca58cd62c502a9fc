export * from "./clock";
export * from "./logging";
export * from "./request-trace.interceptor";
export * from "./sentry";
export * from "./setup";
