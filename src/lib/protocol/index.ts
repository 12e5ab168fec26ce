// Constants
export * from "./constants.ts";

// Wire types
export type * from "./response-types.ts";

// Interfaces and configs
export * from "./interfaces/index.ts";

// Parsers
export { ResponseParser } from "./parsers/response-parser.ts";
