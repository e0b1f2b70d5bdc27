export * from "./fs.js";
