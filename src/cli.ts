#!/usr/bin/env node
/**
 * dugout CLI
 * Ask baseball questions from the terminal, or inspect how a question is
 * read without touching the store or the model.
 */

import { cac } from 'cac';
import { loadConfig, loadPipelineSettings } from './config.js';
import { Dugout } from './Dugout.js';
import { classifyWithDetail } from './services/classifier.js';
import { compile, describePlan } from './services/compiler.js';
import { createContext } from './services/context.js';
import type { QueryContext } from './services/context.js';
import { extractEntities } from './services/entities.js';
import { ConfigError } from './types/errors.js';
import { runAsk } from './cli/ask.js';
import * as output from './cli/logger.js';

interface CommonOptions {
  now?: string;
}

const cli = cac('dugout');

cli.version('0.1.0');
cli.help();
cli.option('--now <iso>', 'Clock for relative dates (ISO timestamp)');

function parseNow(options: CommonOptions): Date {
  if (!options.now) return new Date();
  const now = new Date(options.now);
  if (Number.isNaN(now.getTime())) {
    throw new Error(`Invalid --now value: ${options.now}`);
  }
  return now;
}

/**
 * Context for the offline commands. Only the pipeline settings are read
 * from the environment, so no store credentials are needed.
 */
function offlineContext(): QueryContext {
  return createContext({ settings: loadPipelineSettings() });
}

function fail(error: unknown): never {
  if (error instanceof ConfigError) {
    output.failure('Invalid configuration');
    for (const issue of error.issues) {
      output.failure(issue);
    }
    output.hint('Copy .env.example to .env and fill in the missing values');
  } else {
    output.failure('Command failed', error instanceof Error ? error.message : String(error));
  }
  process.exit(1);
}

/**
 * dugout ask <question>
 */
cli
  .command('ask <question>', 'Answer a question')
  .option('--raw', 'Print the answer object as JSON')
  .action(async (question: string, options: CommonOptions & { raw?: boolean }) => {
    try {
      const now = parseNow(options);
      await runAsk(Dugout.fromConfig(loadConfig()), question, { now, raw: options.raw });
    } catch (error) {
      fail(error);
    }
  });

/**
 * dugout classify <question>
 */
cli
  .command('classify <question>', 'Show which category a question falls into')
  .action((question: string, options: CommonOptions) => {
    try {
      const context = offlineContext();
      const entities = extractEntities(question, context, parseNow(options));
      const result = classifyWithDetail(question, entities, context);

      output.heading('Classification');
      output.field('category', result.category);
      output.field('rule', result.rule);
      for (const [name, value] of Object.entries(result.signals)) {
        output.field(name, String(value), value);
      }
      if (result.tableHint) {
        output.field('table hint', `${result.tableHint.table} (${result.tableHint.score.toFixed(3)})`);
      }
    } catch (error) {
      fail(error);
    }
  });

/**
 * dugout entities <question>
 */
cli
  .command('entities <question>', 'Show the date, teams and players found in a question')
  .action((question: string, options: CommonOptions) => {
    try {
      const context = offlineContext();
      const entities = extractEntities(question, context, parseNow(options));
      const { date } = entities;

      output.heading('Entities');
      output.field(
        'date',
        date.kind === 'day' ? date.date : date.kind === 'range' ? `${date.from} .. ${date.to}` : 'none',
        date.kind !== 'none'
      );
      output.field('teams', entities.teams.join(', ') || 'none', entities.teams.length > 0);
      output.field('players', entities.players.join(', ') || 'none', entities.players.length > 0);
    } catch (error) {
      fail(error);
    }
  });

/**
 * dugout compile <sql>
 */
cli
  .command('compile <sql>', 'Compile a pseudo-SQL statement into a query plan')
  .option('--question <text>', 'Question the statement answers (drives role detection)', { default: '' })
  .action((sql: string, options: CommonOptions & { question: string }) => {
    try {
      const result = compile(sql, options.question, offlineContext());
      if (!result.ok) {
        output.failure(result.error.message);
        process.exit(1);
      }
      output.heading('Plan');
      output.planLines(describePlan(result.plan));
    } catch (error) {
      fail(error);
    }
  });

cli.parse();
