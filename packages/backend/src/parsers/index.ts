export * from "./MarkdownParser.js";
export * from "./PDFParser.js";
export * from "./TextParser.js";
export * from "./fileValidator.js";
export * from "./types.js";
