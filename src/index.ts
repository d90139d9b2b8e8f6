export * from "./core/failure.ts";
export * from "./core/sink.ts";
export * from "./core/sourceContext.ts";
export * from "./core/typeName.ts";
export * from "./render/logArguments.ts";
export * from "./render/renderValue.ts";
export * from "./runner/checks.ts";
export * from "./runner/runner.ts";
