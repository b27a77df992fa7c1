import { createInterface } from "node:readline/promises";

export function isAffirmative(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}

/**
 * Ask a yes/no question on the terminal. Without an interactive stdin there
 * is nobody to answer, which counts as no.
 */
export async function confirm(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) return false;

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return isAffirmative(await rl.question(question));
  } finally {
    rl.close();
  }
}
