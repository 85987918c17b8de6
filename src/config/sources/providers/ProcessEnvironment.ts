/**
 * Process Environment
 *
 * Reads from process.env (or any snapshot of it passed in).
 */

import type { IEnvironment } from '../IEnvironment.js';

export class ProcessEnvironment implements IEnvironment {
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  /**
   * Values are returned untrimmed; a variable set to "" is still present.
   */
  lookup(name: string): string | undefined {
    return this.env[name];
  }
}

/**
 * In-memory environment, handy for tests and for callers that gather
 * settings from somewhere other than the process.
 */
export class StaticEnvironment implements IEnvironment {
  private readonly values: Map<string, string>;

  constructor(values: Record<string, string> = {}) {
    this.values = new Map(Object.entries(values));
  }

  lookup(name: string): string | undefined {
    return this.values.get(name);
  }
}
