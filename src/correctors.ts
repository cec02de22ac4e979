/**
 * docschema Text Correctors — optional diagram cleanup by an external service
 *
 * A corrector rewrites the rendered draft. Failures are thrown as
 * EXTERNAL_SERVICE_FAILED; the normalizer catches them and keeps the draft.
 */

import Anthropic from '@anthropic-ai/sdk';
import { DocSchemaError, errorMessage } from './errors.js';
import type { DocSchemaLogger } from './logger.js';
import { DIAGRAM_HEADER } from './render.js';

export interface TextCorrector {
  readonly name: string;
  correct(text: string): Promise<string>;
}

// ─── No-op ───────────────────────────────────────────────────────────────────

export class NoopCorrector implements TextCorrector {
  readonly name = 'noop';

  async correct(text: string): Promise<string> {
    return text;
  }
}

// ─── Remote (Anthropic Messages API) ─────────────────────────────────────────

export interface CompletionRequest {
  model: string;
  maxTokens: number;
  system: string;
  prompt: string;
}

/** Sends one request and resolves with the reply's text. */
export type CompletionFn = (request: CompletionRequest) => Promise<string>;

export const CORRECTION_SYSTEM_PROMPT =
  'You are a MongoDB schema validator. Only output the fixed Mermaid diagram.';

export function buildCorrectionPrompt(diagram: string): string {
  return [
    'You are a MongoDB schema validator. Please review and fix the following Mermaid diagram:',
    "1. Remove any duplicate type declarations (e.g., 'string string' should be just 'string')",
    '2. Ensure proper spacing between entities',
    '3. Fix any syntax errors',
    '4. Keep field names with underscores (dots should already be replaced)',
    '5. Return only the fixed Mermaid diagram, nothing else',
    '',
    "Here's the diagram to fix:",
    '',
    diagram,
  ].join('\n');
}

/**
 * Pull the diagram out of a reply: from the first `erDiagram` line up to the
 * next code fence, without blank lines. Null when the reply has no diagram.
 */
export function extractDiagram(reply: string): string | null {
  const lines: string[] = [];
  let inDiagram = false;

  for (const raw of reply.split('\n')) {
    const line = raw.trim();
    if (line === DIAGRAM_HEADER) {
      inDiagram = true;
      lines.push(line);
    } else if (inDiagram) {
      if (line.startsWith('```')) {
        inDiagram = false;
      } else if (line) {
        lines.push(line);
      }
    }
  }

  return lines.length > 0 ? lines.join('\n') : null;
}

export function anthropicCompletion(apiKey: string, timeoutMs: number): CompletionFn {
  const client = new Anthropic({ apiKey, timeout: timeoutMs });

  return async (request) => {
    const response = await client.messages.create({
      model: request.model,
      max_tokens: request.maxTokens,
      temperature: 0,
      system: request.system,
      messages: [{ role: 'user', content: request.prompt }],
    });
    return response.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');
  };
}

export interface AnthropicCorrectorOptions {
  model: string;
  maxTokens: number;
  complete: CompletionFn;
  logger?: DocSchemaLogger;
}

export class AnthropicCorrector implements TextCorrector {
  readonly name = 'anthropic';
  private options: AnthropicCorrectorOptions;

  constructor(options: AnthropicCorrectorOptions) {
    this.options = options;
  }

  async correct(text: string): Promise<string> {
    let reply: string;
    try {
      reply = await this.options.complete({
        model: this.options.model,
        maxTokens: this.options.maxTokens,
        system: CORRECTION_SYSTEM_PROMPT,
        prompt: buildCorrectionPrompt(text),
      });
    } catch (err) {
      throw new DocSchemaError({
        code: 'EXTERNAL_SERVICE_FAILED',
        message: `Diagram correction request failed: ${errorMessage(err)}`,
        fix: `Check CLAUDE_API_KEY and network access, or run with --no-correct.`,
        originalError: err,
      });
    }

    this.options.logger?.debug(`Correction reply: ${reply}`);

    const diagram = extractDiagram(reply);
    if (diagram === null) {
      throw new DocSchemaError({
        code: 'EXTERNAL_SERVICE_FAILED',
        message: `Correction reply did not contain an ${DIAGRAM_HEADER} block.`,
        fix: `Retry, or run with --no-correct to skip the correction pass.`,
      });
    }
    return diagram;
  }
}
