import * as readline from 'readline';

export function createInterface(): readline.Interface {
  return readline.createInterface({
    input: process.stdin,
    output: process.stdout
  });
}

export function askQuestion(rl: readline.Interface, question: string): Promise<string> {
  return new Promise(resolve => {
    rl.question(question, answer => {
      resolve(answer);
    });
  });
}

/**
 * A port number 0-65535, or null
 */
export function parsePort(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d{1,5}$/.test(trimmed)) {
    return null;
  }
  const port = Number(trimmed);
  return port <= 65535 ? port : null;
}

/**
 * Ask until a valid port is typed
 */
export async function askPort(rl: readline.Interface, question: string): Promise<number> {
  let answer = await askQuestion(rl, question);
  let port = parsePort(answer);
  while (port === null) {
    console.log('Error: Invalid port number. Port must be between 0 and 65535.');
    answer = await askQuestion(rl, '');
    port = parsePort(answer);
  }
  return port;
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Parse a --port value; throws on anything but 0-65535
 */
export function requirePort(text: string): number {
  const port = parsePort(text);
  if (port === null) {
    throw new Error(`Invalid port: ${text}`);
  }
  return port;
}

/**
 * Open a terminal prompt for one question and close it again
 */
export async function prompt<T>(ask: (rl: readline.Interface) => Promise<T>): Promise<T> {
  const rl = createInterface();
  try {
    return await ask(rl);
  } finally {
    rl.close();
  }
}
