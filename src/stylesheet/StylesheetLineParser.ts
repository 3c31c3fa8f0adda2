/**
 * StylesheetLineParser
 *
 * File-level entry point: runs the lenient parser over a whole stylesheet,
 * collects its lines and summarizes the structure.
 *
 * @since 2026-10-19
 */

import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { StyleLine } from '../lines/StyleLine.js';
import { LenientStyleParser } from '../parser/LenientStyleParser.js';
import type { CharacterSource } from '../tokenizer/types.js';
import type {
  StylesheetDialect,
  StylesheetFormatOptions,
  StylesheetInfo,
  StylesheetParseOptions,
  StylesheetParseResult,
} from './types.js';

const DIALECTS: Record<string, StylesheetDialect> = {
  '.css': 'css',
  '.scss': 'scss',
  '.sass': 'sass',
  '.less': 'less',
};

export class StylesheetLineParser {
  readonly extensions = Object.keys(DIALECTS);

  /**
   * Check file extension
   */
  canHandle(filePath: string): boolean {
    return this.extensions.includes(extname(filePath).toLowerCase());
  }

  /**
   * Parse stylesheet content
   */
  parseFile(
    filePath: string,
    content: string,
    options: StylesheetParseOptions = {}
  ): StylesheetParseResult {
    const includeLines = options.includeLines ?? true;
    const verbose = options.verbose ?? false;

    const parser = new LenientStyleParser(content);
    const lines: StyleLine[] = [];
    let lineCount = 0;
    let blockCount = 0;
    let propertyCount = 0;
    let unknownCount = 0;
    let maxDepth = 0;
    let strayClosures = 0;

    for (;;) {
      const depthBefore = parser.depth;
      const line = parser.nextLine();
      if (line === null) {
        break;
      }

      lineCount++;
      switch (line.kind) {
        case 'block-opening':
          blockCount++;
          break;
        case 'property':
          propertyCount++;
          break;
        case 'unknown':
          unknownCount++;
          break;
        case 'block-closure':
          if (depthBefore === 0) {
            strayClosures++;
          }
          break;
      }

      maxDepth = Math.max(maxDepth, parser.depth);
      if (includeLines) {
        lines.push(line);
      }
    }

    const unclosedBlocks = parser.depth;
    if (verbose) {
      if (unclosedBlocks > 0) {
        console.warn(`⚠️ ${filePath}: ${unclosedBlocks} block(s) left open at end of file`);
      }
      if (strayClosures > 0) {
        console.warn(`⚠️ ${filePath}: ${strayClosures} closing brace(s) with no open block`);
      }
    }

    const stylesheet: StylesheetInfo = {
      uuid: uuidv4(),
      file: filePath,
      hash: createHash('sha256').update(content).digest('hex').slice(0, 16),
      dialect: DIALECTS[extname(filePath).toLowerCase()] ?? 'css',
      linesOfCode: content.split('\n').length,
      lineCount,
      blockCount,
      propertyCount,
      unknownCount,
      maxDepth,
      unclosedBlocks,
      strayClosures,
    };

    return { stylesheet, lines };
  }

  /**
   * Read and parse a stylesheet from disk
   */
  async readFile(
    filePath: string,
    options: StylesheetParseOptions = {}
  ): Promise<StylesheetParseResult> {
    const content = await readFile(filePath, 'utf-8');
    return this.parseFile(filePath, content, options);
  }

  /**
   * Reformat a stylesheet: one statement per line, indented by nesting
   */
  format(source: CharacterSource, options: StylesheetFormatOptions = {}): string {
    const indent = options.indent ?? '\t';
    const code = LenientStyleParser.parseAll(source).map((line) => line.toCssCode(indent));
    return code.length > 0 ? `${code.join('\n')}\n` : '';
  }
}
