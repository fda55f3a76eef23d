/**
 * Question Inspector
 *
 * Prints the raw markup of question blocks next to their structured entries
 * in chapter.json. Handy when a question comes out wrong.
 *
 * Usage:
 *   npm run inspect -- [--html tmp.html] [--json output/chapter.json] [-q 4] [--index 12] [--limit 5]
 */

import { existsSync, readFileSync } from 'node:fs';
import { parseArgs } from 'node:util';
import { loadConfig, parseJson } from '../lib/config';
import {
  buildStructuredLookup,
  describeQuestion,
  listQuestionNodes,
  matchStructured,
  selectQuestions,
  type StructuredLookup
} from '../lib/inspect';

const colors = {
  reset: '\x1b[0m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

function log(message: string, color: string = colors.reset) {
  console.log(`${color}${message}${colors.reset}`);
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`--${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function main() {
  try {
    const config = loadConfig();
    const { values } = parseArgs({
      options: {
        html: { type: 'string' },
        json: { type: 'string' },
        question: { type: 'string', short: 'q' },
        index: { type: 'string' },
        limit: { type: 'string' },
      },
    });

    const htmlPath = values.html ?? config.inspectHtmlPath;
    const jsonPath = values.json ?? config.inspectJsonPath;
    if (!existsSync(htmlPath)) {
      throw new Error(`HTML file not found: ${htmlPath}`);
    }

    let lookup: StructuredLookup = new Map();
    if (existsSync(jsonPath)) {
      lookup = buildStructuredLookup(parseJson(readFileSync(jsonPath, 'utf-8'), jsonPath));
    } else {
      log(`Structured file ${jsonPath} not found; showing markup only`, colors.yellow);
    }

    const nodes = listQuestionNodes(readFileSync(htmlPath, 'utf-8'));
    const matches = selectQuestions(nodes, {
      number: values.question,
      index: parsePositiveInt(values.index, 'index'),
      limit: parsePositiveInt(values.limit, 'limit'),
    });

    for (const node of matches) {
      console.log(describeQuestion(node, matchStructured(node, lookup)).join('\n'));
    }
  } catch (error) {
    log(`❌ ${error instanceof Error ? error.message : String(error)}`, colors.red);
    process.exit(1);
  }
}

main();
