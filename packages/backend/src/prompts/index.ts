export * from "./synthesis.js";
