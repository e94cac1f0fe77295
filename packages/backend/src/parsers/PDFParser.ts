// The package entry point runs a self-test when it believes it is the main module, which
// is always the case under ESM; the library file underneath has no such side effect.
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { countLines, countWords, type DocumentParser, type ParsedDocumentResult } from "./types.js";

export class PDFParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const result = await pdfParse(buffer);
    const text = result.text;

    return {
      text,
      metadata: {
        pageCount: result.numpages,
        wordCount: countWords(text),
        lineCount: countLines(text)
      }
    };
  }
}
