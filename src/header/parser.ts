import Parser from "tree-sitter";
import Cpp from "tree-sitter-cpp";
import type { Entity } from "../types.js";
import { buildTranslationUnit } from "./entities.js";

const cppParser = new Parser();
cppParser.setLanguage(Cpp);

export interface ParsedHeader {
  root: Entity;
  /** tree-sitter recovered from syntax errors; declarations inside them are lost. */
  hasSyntaxErrors: boolean;
}

// ---------------------------------------------------------------------------
// tree-sitter 0.21.x workaround: string input fails at >= 32768 bytes due to
// a signed 16-bit overflow in the native binding. The callback form of
// parser.parse() does not have this limit.
// ---------------------------------------------------------------------------

const TREE_SITTER_STRING_LIMIT = 32768;

function treeSitterParse(source: string): Parser.Tree {
  if (source.length < TREE_SITTER_STRING_LIMIT) {
    return cppParser.parse(source);
  }
  return cppParser.parse((index: number) => source.slice(index, index + 4096));
}

/**
 * Parse a generated C++ header into the declaration tree walked by the
 * extractor. Throws when tree-sitter produces no tree at all.
 */
export function parseHeader(source: string, filePath: string): ParsedHeader {
  const tree = treeSitterParse(source);
  if (!tree || !tree.rootNode) {
    throw new Error(`tree-sitter returned empty tree for ${filePath}`);
  }

  return {
    root: buildTranslationUnit(tree, filePath, treeSitterParse),
    hasSyntaxErrors: tree.rootNode.descendantsOfType("ERROR").length > 0,
  };
}
