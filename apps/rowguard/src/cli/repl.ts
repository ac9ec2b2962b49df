/**
 * 対話ループ
 * 表示はこのモジュールに閉じ、パイプラインはライブラリとして呼ぶ
 */
import { createInterface } from 'node:readline/promises';
import type { Principal } from '../domain/types.js';
import type { Orchestrator } from '../pipeline/orchestrator.js';
import { renderResult } from '../pipeline/result.js';

export const QUIT_COMMAND = 'quit';

export interface ReplIo {
  readonly input: NodeJS.ReadableStream;
  readonly output: NodeJS.WritableStream;
}

export const welcomeLines = (principal: Principal): string[] => [
  "Welcome to the AI Assistant! Type 'quit' to exit.",
  `Logged in as: ${principal.displayName} (${principal.identity})`,
  'You can ask questions about your own data in natural language.',
  `Your user ID is: ${principal.id}`,
];

/**
 * 入力が尽きるか quit が入力されるまで対話を続ける
 */
export async function runRepl(
  orchestrator: Orchestrator,
  principal: Principal,
  io: ReplIo = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const print = (line: string): void => {
    io.output.write(`${line}\n`);
  };
  welcomeLines(principal).forEach(print);

  const rl = createInterface({ input: io.input, output: io.output, terminal: false });
  rl.setPrompt('\nYou: ');
  rl.prompt();
  try {
    for await (const line of rl) {
      const request = line.trim();
      if (request.toLowerCase() === QUIT_COMMAND) {
        print('Goodbye!');
        break;
      }
      if (request !== '') {
        const { result } = await orchestrator.handle(request);
        print('');
        renderResult(result).forEach(print);
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}
