import chalk from 'chalk';
import inquirer from 'inquirer';

export const say = {
  info: (msg: string) => console.log(chalk.blue('ℹ'), msg),
  success: (msg: string) => console.log(chalk.green('✓'), msg),
  warning: (msg: string) => console.log(chalk.yellow('⚠'), msg),
  error: (msg: string) => console.log(chalk.red('✗'), msg),
  header: (msg: string) => console.log(chalk.bold.cyan(msg)),
  dim: (msg: string) => console.log(chalk.dim(msg)),
  rule: () => console.log('━'.repeat(60)),
};

export async function confirm(message: string, def = true): Promise<boolean> {
  const { ok } = await inquirer.prompt<{ ok: boolean }>([{ type: 'confirm', name: 'ok', message, default: def }]);
  return ok;
}

export interface Choice<T> {
  name: string;
  value: T;
}

export async function choose<T>(message: string, choices: Choice<T>[]): Promise<T> {
  const { picked } = await inquirer.prompt<{ picked: T }>([{ type: 'list', name: 'picked', message, choices, pageSize: 15 }]);
  return picked;
}

export async function ask(message: string, opts: { default?: string; validate?: (input: string) => true | string } = {}): Promise<string> {
  const { answer } = await inquirer.prompt<{ answer: string }>([
    { type: 'input', name: 'answer', message, default: opts.default, validate: opts.validate },
  ]);
  return answer.trim();
}

export async function askNumber(message: string, opts: { optional?: boolean; default?: string } = {}): Promise<number | null> {
  const raw = await ask(message, {
    default: opts.default,
    validate: (input) => {
      if (opts.optional && input.trim() === '') return true;
      const n = Number(input);
      return Number.isFinite(n) && n >= 0 ? true : 'Enter a number';
    },
  });
  return raw === '' ? null : Number(raw);
}

export async function waitForEnter(message: string): Promise<void> {
  await inquirer.prompt<{ done: string }>([{ type: 'input', name: 'done', message }]);
}

export function table(rows: string[][], widths: number[]) {
  for (const row of rows) {
    console.log(row.map((cell, i) => (i < widths.length ? cell.padEnd(widths[i]) : cell)).join('  '));
  }
}
