// src/repl.ts
import readline from 'readline';
import type { Agent } from './agent/index.js';
import type { LocalePack } from './locales/types.js';
import { info, error } from './utils/logger.js';

export type ReplOutcome =
  | { type: 'reply'; text: string }
  | { type: 'skip' }
  | { type: 'exit' };

/**
 * One line of input: built-in commands first, everything else is a turn.
 */
export async function handleLine(
  line: string,
  agent: Pick<Agent, 'processQuery' | 'reset'>,
  pack: LocalePack
): Promise<ReplOutcome> {
  const input = line.trim();
  if (!input) return { type: 'skip' };

  const command = input.toLowerCase();
  if (command === 'quit') {
    return { type: 'exit' };
  }
  if (command === 'clear') {
    agent.reset();
    return { type: 'reply', text: pack.repl.cleared };
  }

  return { type: 'reply', text: await agent.processQuery(input) };
}

export interface ReplStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Run the chat loop until "quit" or end of input. Lines are queued so turns
 * never overlap, even when input is pasted faster than replies arrive.
 */
export function startRepl(
  agent: Pick<Agent, 'processQuery' | 'reset'>,
  pack: LocalePack,
  streams: ReplStreams = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const { input, output } = streams;
  const rl = readline.createInterface({
    input,
    output,
    prompt: pack.repl.prompt,
  });

  const print = (text: string) => {
    output.write(`\n${text}\n`);
  };

  print(pack.repl.banner);

  let queue: Promise<void> = Promise.resolve();
  let exited = false;
  let closed = false;

  const processLine = async (line: string): Promise<void> => {
    if (exited) return;

    try {
      const outcome = await handleLine(line, agent, pack);

      switch (outcome.type) {
        case 'exit':
          exited = true;
          print(pack.repl.goodbye);
          rl.close();
          return;
        case 'reply':
          print(outcome.text);
          break;
        case 'skip':
          break;
      }
    } catch (err) {
      error('REPL error', { error: String(err) });
      print(pack.messages.turnFailure);
    }

    if (!closed) rl.prompt();
  };

  rl.prompt();

  return new Promise((resolve) => {
    rl.on('line', (line) => {
      queue = queue.then(() => processLine(line));
    });

    rl.on('close', () => {
      closed = true;
      // Piped input closes early; drain the queued lines before handing back
      queue.then(() => {
        info('Session ended');
        resolve();
      }, (err: unknown) => {
        error('REPL queue failed', { error: String(err) });
        resolve();
      });
    });
  });
}
