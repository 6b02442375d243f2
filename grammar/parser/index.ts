/**
 * Formula Parser Entry Point
 *
 * Compiles grammar/formula.peggy on first use and parses formula text into
 * the AST declared in core/types/formula.ts.
 */

import * as fs from 'fs';
import { fileURLToPath } from 'url';
import * as peggyModule from 'peggy';
import type { FormulaNode } from '@core/types/formula';
import { FormulaParseError } from '@core/errors/FormulaParseError';
import type { FormulaPosition } from '@core/errors/FormulaParseError';

// Under native ESM the CommonJS build may only expose its exports on `default`
const peggy: typeof peggyModule = typeof peggyModule.generate === 'function'
  ? peggyModule
  : Reflect.get(peggyModule, 'default');

const GRAMMAR_PATH = fileURLToPath(new URL('../formula.peggy', import.meta.url));

let parser: peggyModule.Parser | undefined;

/**
 * The generated parser, built once per process
 */
export function getParser(): peggyModule.Parser {
  if (!parser) {
    const grammar = fs.readFileSync(GRAMMAR_PATH, 'utf8');
    parser = peggy.generate(grammar, {
      cache: true,
      grammarSource: GRAMMAR_PATH
    });
  }
  return parser;
}

/**
 * Parse formula text into an AST
 *
 * @throws {FormulaParseError} If the text is not a valid formula
 */
export function parseFormula(source: string, parameter?: string): FormulaNode {
  const formulaParser = getParser();
  try {
    return formulaParser.parse(source);
  } catch (error) {
    if (error instanceof formulaParser.SyntaxError) {
      throw new FormulaParseError(error.message, source, toPosition(error.location), {
        cause: error,
        parameter
      });
    }
    throw error;
  }
}

function toPosition(location: peggyModule.LocationRange | undefined): FormulaPosition | undefined {
  if (!location) {
    return undefined;
  }
  return {
    line: location.start.line,
    column: location.start.column,
    offset: location.start.offset
  };
}
