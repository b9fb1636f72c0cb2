// src/diagnostics/index.ts
//
// One import point for the diagnostics model.

export * from "./errors";
