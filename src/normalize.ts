/**
 * docschema Diagram Normalization
 *
 *   draft → corrector (optional, may fail) → cleanDiagram → framed artifact
 *
 * cleanDiagram is deterministic and idempotent on text without dots.
 */

import type { TextCorrector } from './correctors.js';
import type { DocSchemaLogger } from './logger.js';
import { DocSchemaError, errorMessage } from './errors.js';
import { CLOSING_FENCE, DIAGRAM_HEADER } from './render.js';

const INDENT = '    ';

// Relationship lines contain `{` inside `||--o{`, so only `<name> {` opens a block
const ENTITY_OPEN = /^(\S+?)\s*\{$/;

export function cleanDiagram(text: string): string {
  const cleaned: string[] = [];
  let currentEntity: string | null = null;

  for (const rawLine of text.split('\n')) {
    const line = rawLine.replaceAll('.', '_').trim();

    if (line === '' || line === DIAGRAM_HEADER) {
      cleaned.push(line);
      continue;
    }

    const opening = ENTITY_OPEN.exec(line);
    if (opening?.[1]) {
      currentEntity = opening[1];
      cleaned.push(`${currentEntity} {`);
      continue;
    }

    if (line === '}') {
      cleaned.push('}');
      currentEntity = null;
      continue;
    }

    if (currentEntity === null) {
      cleaned.push(line);
      continue;
    }

    if (line.includes(':')) {
      // `name: type`; anything after a second colon is dropped
      const [left = '', right = ''] = line.split(':');
      cleaned.push(`${INDENT}${left.trim()} ${right.trim()}`.trimEnd());
      continue;
    }

    cleaned.push(`${INDENT}${line.split(/\s+/).join(' ')}`);
  }

  return cleaned.join('\n');
}

/**
 * Header, cleaned lines, closing fence. A header already at the top of the
 * cleaned text is not repeated.
 */
export function frameDiagram(cleaned: string): string {
  const lines = cleaned.split('\n');
  while (lines.length > 1 && lines[0] === '') lines.shift();
  if (lines[0] === DIAGRAM_HEADER) lines.shift();
  return `${DIAGRAM_HEADER}\n${lines.join('\n')}\n${CLOSING_FENCE}\n`;
}

export interface NormalizeResult {
  content: string;
  /** True when the corrector returned text different from the draft. */
  corrected: boolean;
}

export class DiagramNormalizer {
  private corrector: TextCorrector;
  private logger: DocSchemaLogger;

  constructor(corrector: TextCorrector, logger: DocSchemaLogger) {
    this.corrector = corrector;
    this.logger = logger;
  }

  async normalize(draft: string): Promise<NormalizeResult> {
    this.logger.info('Cleaning up diagram format...');
    let text = draft;

    try {
      text = await this.corrector.correct(draft);
    } catch (err) {
      const code = err instanceof DocSchemaError ? err.code : 'EXTERNAL_SERVICE_FAILED';
      this.logger.correctionFailed(code, errorMessage(err));
    }

    return { content: frameDiagram(cleanDiagram(text)), corrected: text !== draft };
  }
}
