import * as readline from "node:readline";

export type Ask = (question: string) => Promise<string>;

function ask(rl: readline.Interface, question: string): Promise<string> {
  return new Promise((resolve) => rl.question(question, resolve));
}

/**
 * Ask a y/n question until the answer is y or n.
 * `askFn` defaults to a readline prompt on stdin/stderr.
 */
export async function confirm(question: string, askFn?: Ask): Promise<boolean> {
  if (askFn) return confirmWith(question, askFn);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });
  try {
    return await confirmWith(question, (q) => ask(rl, q));
  } finally {
    rl.close();
  }
}

async function confirmWith(question: string, askFn: Ask): Promise<boolean> {
  let answer = (await askFn(`${question} (y for YES | n for NO)\n>>> `)).trim().toLowerCase();
  while (answer !== "y" && answer !== "n") {
    answer = (await askFn("Invalid input, please enter y or n\n>>> ")).trim().toLowerCase();
  }
  return answer === "y";
}
