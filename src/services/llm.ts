/**
 * LLM integration layer using the AI SDK.
 *
 * The pipeline treats the model as two string-in/string-out calls: one
 * writes pseudo-SQL for a question, one phrases the final answer from the
 * rows the store returned.
 */

import { generateText } from 'ai';
import type { LanguageModel } from 'ai';
import type { Logger } from 'pino';
import type { LLMSettings } from '../config.js';
import { LLMError } from '../types/errors.js';
import type { ResolvedEntities, TableDescriptor } from '../types/models.js';
import type { Row } from '../types/utils.js';
import type { QueryContext } from './context.js';

export interface LanguageModelClient {
  generateSql(prompt: string): Promise<string>;
  renderAnswer(question: string, rows: readonly Row[]): Promise<string>;
}

const SQL_SYSTEM_PROMPT = `You translate baseball statistics questions into a single SQL SELECT statement.
The statement is not executed as SQL: it is parsed and turned into filtered REST reads, so keep to this subset.

Rules:
- Exactly one SELECT from exactly one table, ending with a semicolon
- No JOIN, GROUP BY, aggregates, sub-queries, DISTINCT, LIKE or OFFSET
- WHERE may use =, IN (...), >, >=, <, <=, !=, BETWEEN and IS [NOT] NULL joined with AND
- Use the canonical team codes given below for team columns
- Use ORDER BY <column> DESC LIMIT n for "best", "most" and "leader" questions
- Return only the statement, no explanation`;

const ANSWER_SYSTEM_PROMPT = `You answer baseball statistics questions for fans.
Use only the rows provided. Be brief and precise, and state the numbers you rely on.
If the rows do not answer the question, say so.`;

/**
 * Pull the statement out of a model response: code fences and any prose
 * before the SELECT are dropped, and everything after the first semicolon.
 */
export function extractSql(response: string): string {
  let text = response.trim();
  const fenced = /```(?:sql)?\s*([\s\S]*?)```/i.exec(text);
  if (fenced) {
    text = fenced[1].trim();
  }
  const start = text.search(/\bselect\b/i);
  if (start > 0) {
    text = text.slice(start);
  }
  const end = text.indexOf(';');
  return end >= 0 ? text.slice(0, end + 1) : text;
}

function describeTable(table: TableDescriptor): string {
  const columns = table.columns.map((column) => `${column.name} (${column.type})`).join(', ');
  return `- ${table.name}: ${table.description}\n  columns: ${columns}`;
}

export interface SqlPromptInput {
  question: string;
  entities: ResolvedEntities;
  today: string;
  tableHint: { table: string; score: number } | null;
}

/**
 * Prompt for the SQL call: schema, resolved entities and the table hint.
 */
export function buildSqlPrompt(input: SqlPromptInput, context: QueryContext): string {
  const lines = ['Tables:', ...[...context.tables.values()].map(describeTable), ''];

  lines.push(
    `Team codes: ${context.teams.codes.map((code) => `${code} = ${context.teams.nameOf(code)}`).join(', ')}`
  );
  lines.push(`Current season: ${context.settings.currentSeason}`);
  lines.push(`Today: ${input.today}`);

  if (input.entities.teams.length > 0) {
    lines.push(`Teams in the question: ${input.entities.teams.join(', ')}`);
  }
  if (input.entities.players.length > 0) {
    lines.push(`Players in the question: ${input.entities.players.join(', ')}`);
  }
  const { date } = input.entities;
  if (date.kind === 'day') {
    lines.push(`Date in the question: ${date.date}`);
  } else if (date.kind === 'range') {
    lines.push(`Dates in the question: ${date.from} to ${date.to}`);
  }
  if (input.tableHint) {
    lines.push(`The question most likely concerns the table ${input.tableHint.table}.`);
  }

  lines.push('', `Question: ${input.question}`);
  return lines.join('\n');
}

export interface LLMServiceOptions {
  logger: Logger;
  maxTokens?: number;
  maxRetries?: number;
  /** Base of the exponential backoff between retries. */
  retryDelayMs?: number;
}

/**
 * Service for interacting with LLM APIs via AI SDK.
 */
export class LLMService implements LanguageModelClient {
  private modelPromise: Promise<LanguageModel> | null = null;
  private readonly logger: Logger;
  private readonly maxTokens: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly settings: LLMSettings,
    options: LLMServiceOptions
  ) {
    this.logger = options.logger.child({ module: 'llm' });
    this.maxTokens = options.maxTokens ?? 1024;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  /**
   * Lazy initialization of the model; providers are imported on first use.
   */
  private initializeModel(): Promise<LanguageModel> {
    if (!this.modelPromise) {
      this.modelPromise = this.loadModel();
    }
    return this.modelPromise;
  }

  private async loadModel(): Promise<LanguageModel> {
    const { provider, model, apiKey } = this.settings;
    this.logger.info(`Initializing LLM: ${provider}/${model}`);

    switch (provider) {
      case 'anthropic': {
        const { createAnthropic } = await import('@ai-sdk/anthropic');
        return createAnthropic({ apiKey })(model);
      }
      case 'openai': {
        const { createOpenAI } = await import('@ai-sdk/openai');
        return createOpenAI({ apiKey })(model);
      }
    }
  }

  /**
   * Call the model with exponential backoff between attempts.
   *
   * @throws LLMError if all retries fail
   */
  private async call(prompt: string, system: string, temperature: number): Promise<string> {
    const model = await this.initializeModel();

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const result = await generateText({
          model,
          system,
          prompt,
          temperature,
          maxOutputTokens: this.maxTokens,
        });
        return result.text;
      } catch (error) {
        if (attempt === this.maxRetries - 1) {
          throw new LLMError(`LLM API failed after ${this.maxRetries} attempts: ${error}`);
        }
        const waitTime = this.retryDelayMs * Math.pow(2, attempt);
        this.logger.warn({ err: error, attempt: attempt + 1, waitTime }, 'LLM call failed, retrying');
        await new Promise((resolve) => setTimeout(resolve, waitTime));
      }
    }

    throw new LLMError('LLM API was not called: maxRetries must be at least 1');
  }

  async generateSql(prompt: string): Promise<string> {
    return this.call(prompt, SQL_SYSTEM_PROMPT, 0);
  }

  async renderAnswer(question: string, rows: readonly Row[]): Promise<string> {
    const prompt = `Question: ${question}\n\nRows (JSON):\n${JSON.stringify(rows.slice(0, 20), null, 2)}`;
    return (await this.call(prompt, ANSWER_SYSTEM_PROMPT, 0.3)).trim();
  }
}
