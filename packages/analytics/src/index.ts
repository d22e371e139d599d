export * from "./aggregate.js";
export * from "./csv.js";
export * from "./period.js";
export * from "./periodReport.js";
export * from "./render.js";
