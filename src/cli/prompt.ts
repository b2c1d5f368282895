import * as readline from 'readline';

export function isAffirmative(answer: string): boolean {
  const trimmed = answer.trim();
  return trimmed === 'y' || trimmed === 'Y';
}

/**
 * Ask a yes/no question on the terminal. The prompt goes to stderr so that
 * stdout stays clean for -o json.
 */
export async function confirm(prompt: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  const answer = await new Promise<string>((resolve) => {
    rl.question(prompt, resolve);
    rl.once('close', () => resolve(''));
  });

  rl.close();
  return isAffirmative(answer);
}
