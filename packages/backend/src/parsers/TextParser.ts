import { countLines, countWords, type DocumentParser, type ParsedDocumentResult } from "./types.js";

const BOM = "\uFEFF";

export class TextParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const decoded = buffer.toString("utf8");
    const text = decoded.startsWith(BOM) ? decoded.slice(BOM.length) : decoded;
    return {
      text,
      metadata: {
        wordCount: countWords(text),
        lineCount: countLines(text)
      }
    };
  }
}
