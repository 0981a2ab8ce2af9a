import chalk from 'chalk';
import * as readline from 'readline';
import { CodeReviewError } from './errors.js';
import type { CodeReviewer } from './reviewer.js';
import type { ChatMessage } from './types.js';

const EXIT_WORDS = new Set(['quit', 'exit', 'q']);

export interface ChatSessionOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Line-based chat with the reviewer. Ends on quit/exit/q or end of input;
 * model errors are printed and the session continues.
 */
export async function runChatSession(reviewer: CodeReviewer, options: ChatSessionOptions): Promise<ChatMessage[]> {
  const { output } = options;
  const history: ChatMessage[] = [];
  const rl = readline.createInterface({ input: options.input, output, terminal: false });

  output.write(chalk.green.bold('\n🚀 Code review assistant is ready!') + '\n');
  output.write(chalk.blue('Ask me to analyze code, suggest algorithms, or review changes.') + '\n');
  output.write(chalk.yellow("Type 'quit' to exit.") + '\n\n');
  output.write(chalk.cyan.bold('You: '));

  try {
    for await (const line of rl) {
      const message = line.trim();

      if (EXIT_WORDS.has(message.toLowerCase())) break;

      if (message) {
        try {
          const reply = await reviewer.chat(history, message);
          history.push({ role: 'user', text: message }, { role: 'model', text: reply });
          output.write('\n' + chalk.yellow.bold('🤖 Assistant:') + '\n' + reply.trimEnd() + '\n\n');
        } catch (error) {
          if (!(error instanceof CodeReviewError)) throw error;
          output.write(chalk.red(`❌ ${error.name}: ${error.message}`) + '\n\n');
        }
      }

      output.write(chalk.cyan.bold('You: '));
    }
  } finally {
    rl.close();
  }

  output.write('\n' + chalk.green.bold('👋 Goodbye!') + '\n');
  return history;
}
