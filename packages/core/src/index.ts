export * from "./schemas/common.js";
export * from "./schemas/report.js";
export * from "./schemas/dictionaries.js";
export * from "./schemas/access.js";
export * from "./schemas/analytics.js";
