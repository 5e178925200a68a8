/**
 * Interactive input: yes/no confirmation, free-text questions and path cleanup
 */

import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { createInterface } from 'readline/promises';

/**
 * Source of answers. The terminal in normal use; canned answers in tests.
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  say(message: string): void;
}

export const terminalPrompter: Prompter = {
  async ask(question: string): Promise<string> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      return await rl.question(question);
    } finally {
      rl.close();
    }
  },
  say(message: string): void {
    console.log(message);
  },
};

/**
 * Ask a [y/N] question. Only "y" and "yes" confirm; `assumeYes` answers for the user.
 */
export async function confirm(prompter: Prompter, question: string, assumeYes = false): Promise<boolean> {
  if (assumeYes) {
    prompter.say(`${question.trimEnd()} y (auto)`);
    return true;
  }
  const answer = (await prompter.ask(question)).trim().toLowerCase();
  return answer === 'y' || answer === 'yes';
}

/**
 * Clean up a path pasted or dragged into a terminal: surrounding quotes and
 * backslash escapes are removed
 */
export function sanitizePath(input: string): string {
  let result = input.trim();

  if (
    result.length >= 2 &&
    ((result.startsWith("'") && result.endsWith("'")) || (result.startsWith('"') && result.endsWith('"')))
  ) {
    result = result.slice(1, -1);
  }

  return result.replaceAll('\\', '');
}

export function expandPath(input: string, home = os.homedir()): string {
  const cleaned = sanitizePath(input);
  if (cleaned.startsWith('~/')) {
    return path.join(home, cleaned.slice(2));
  }
  return cleaned;
}

/**
 * Resolve an output location that may already exist. The user can keep it
 * (Enter) or type another name; `assumeYes` keeps it.
 */
export async function confirmOutputPath(
  prompter: Prompter,
  initial: string,
  assumeYes = false
): Promise<string> {
  let current = initial;

  for (;;) {
    const target = expandPath(current);
    const stat = await fs.stat(target).catch(() => null);
    if (!stat) return current;

    const kind = stat.isDirectory() ? 'Folder' : 'File';
    if (assumeYes) {
      prompter.say(`${kind} '${current}' already exists. Overwriting. (auto)`);
      return current;
    }

    const answer = (
      await prompter.ask(`${kind} '${current}' already exists. Press Enter to overwrite or type a new name:\n> `)
    ).trim();
    if (answer.length === 0) return current;
    current = answer;
  }
}
