export * from "./transfer.schema.js";
