import { unified } from "unified";
import remarkParse from "remark-parse";
import { SKIP, visit } from "unist-util-visit";
import type { Node } from "unist";
import { countLines, countWords, type DocumentParser, type ParsedDocumentResult } from "./types.js";

const BLOCK_TYPES = new Set(["heading", "paragraph", "code", "html", "tableCell"]);

/** Reduces markdown to its readable text, one block per paragraph. */
export class MarkdownParser implements DocumentParser {
  async parse(buffer: Buffer): Promise<ParsedDocumentResult> {
    const source = buffer.toString("utf8");
    const tree = unified().use(remarkParse).parse(source);
    const blocks: string[] = [];

    visit(tree, (node) => {
      if (!BLOCK_TYPES.has(node.type)) {
        return undefined;
      }
      const value = inlineText(node).trim();
      if (value.length > 0) {
        blocks.push(value);
      }
      return SKIP;
    });

    const text = blocks.join("\n\n");
    return {
      text,
      metadata: {
        wordCount: countWords(text),
        lineCount: countLines(source)
      }
    };
  }
}

function inlineText(node: Node): string {
  const parts: string[] = [];
  visit(node, (child) => {
    if (child.type === "break") {
      parts.push("\n");
    } else if ("value" in child && typeof child.value === "string") {
      parts.push(child.value);
    }
  });
  return parts.join("");
}
