// Constants
export * from "./constants.ts";

// Enums
export * from "./opcodes.ts";

// Interfaces and configs
export * from "./interfaces/index.ts";

// Builders
export { ControlFrameBuilder } from "./builders/control-frame.ts";
export { DataFrameBuilder } from "./builders/data-frame.ts";

// Parsers
export { ControlFrameParser } from "./parsers/control-frame-parser.ts";
export { DataFrameParser } from "./parsers/data-frame-parser.ts";

export { formatHex } from "./format.ts";
