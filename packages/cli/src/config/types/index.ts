export * from "./v1/inventory.js";
