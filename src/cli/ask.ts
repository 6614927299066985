/**
 * `dugout ask`: answer one question and print it to stdout.
 */

import type { Dugout } from '../Dugout.js';
import { thinking } from './logger.js';

export interface AskCommandOptions {
  now: Date;
  /** Print the answer object as JSON instead of display text. */
  raw?: boolean;
}

/**
 * Answers `question`, prints the result and closes the store, also when
 * answering fails. Resolves to the printed text.
 */
export async function runAsk(dugout: Dugout, question: string, options: AskCommandOptions): Promise<string> {
  const spin = thinking('Thinking...');
  try {
    await dugout.init();
    const text = options.raw
      ? JSON.stringify(await dugout.ask(question, { now: options.now }), null, 2)
      : await dugout.answer(question, { now: options.now });
    spin.stop();
    console.log(text);
    return text;
  } catch (error) {
    spin.fail();
    throw error;
  } finally {
    await dugout.close();
  }
}
