import * as readline from 'readline';

/**
 * Prompt Utilities
 *
 * Features:
 * - Questions rendered to stderr so stdout stays clean for listings
 * - EOF (Ctrl+D, closed stdin) answers with null; callers pick the default
 * - Scripted answers for tests and unattended runs
 */

export interface PromptQuestion {
  /** Context lines printed before the choices */
  lines: string[];
  /** One line per possible answer */
  choices: string[];
  /** Text shown on the input line */
  prompt: string;
}

export interface Prompter {
  /** Raw answer text, or null when input ended */
  ask(question: PromptQuestion): Promise<string | null>;
}

export function renderQuestion(question: PromptQuestion): string {
  const choices = question.choices.map((choice) => ` * ${choice}`);
  return [...question.lines, 'You can:', ...choices].join('\n');
}

export class InteractivePrompt implements Prompter {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr
  ) {}

  async ask(question: PromptQuestion): Promise<string | null> {
    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
      terminal: true,
    });

    this.output.write(`${renderQuestion(question)}\n`);

    return new Promise((resolve) => {
      let answered = false;
      rl.once('close', () => {
        if (!answered) resolve(null);
      });
      rl.question(question.prompt, (answer: string) => {
        answered = true;
        rl.close();
        resolve(answer);
      });
    });
  }
}

/**
 * Answers questions from a fixed list, in order. Once the list is used up
 * every further question gets null, as if input had ended.
 */
export class ScriptedPrompter implements Prompter {
  readonly asked: PromptQuestion[] = [];
  private readonly answers: string[];

  constructor(answers: readonly string[] = []) {
    this.answers = [...answers];
  }

  async ask(question: PromptQuestion): Promise<string | null> {
    this.asked.push(question);
    return this.answers.shift() ?? null;
  }
}
