/**
 * Guard against reorganizing directories the user probably did not mean to touch.
 */

import { createInterface } from 'readline';
import { isAbsolute, relative, resolve, sep } from 'path';
import type { Confirm } from './types.js';

export interface SafetyPolicy {
  home: string;
  safeRoots: string[];
}

function isWithin(path: string, root: string): boolean {
  const rel = relative(resolve(root), resolve(path));
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

/**
 * True when the base is the home directory itself, or lies outside both home and every safe root.
 */
export function needsConfirmation(base: string, policy: SafetyPolicy): boolean {
  const target = resolve(base);
  if (target === resolve(policy.home)) {
    return true;
  }
  if (isWithin(target, policy.home)) {
    return false;
  }
  return !policy.safeRoots.some(root => isWithin(target, root));
}

export async function confirmBase(base: string, policy: SafetyPolicy, confirm: Confirm): Promise<boolean> {
  if (!needsConfirmation(base, policy)) {
    return true;
  }
  return confirm(`${resolve(base)} is outside the usual media locations. Continue?`);
}

export function createTerminalConfirm(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Confirm {
  return (message) => {
    const rl = createInterface({ input, output });

    return new Promise((resolve) => {
      rl.question(`${message} (y/N) `, (answer) => {
        rl.close();
        resolve(answer.trim().toLowerCase() === 'y');
      });
    });
  };
}
