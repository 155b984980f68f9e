export * from "./parser/index.js";
export { loadParserConfig, getParserConfig, type ParserConfig } from "./config/parser-config.js";
