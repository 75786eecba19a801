import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ExecutionResult, TestCase } from '../schema/index.js';
import { parseExecutionResult, parseTestCaseJSON, serializeTestCase } from '../schema/index.js';

// ── Public interface ─────────────────────────────────────────

export interface TestCaseStore {
  readonly dir: string;
  pathFor(id: string): string;
  loadTestCase(id: string): Promise<TestCase>;
  saveTestCase(id: string, testCase: TestCase): Promise<string>;
  saveExecutionResult(id: string, result: ExecutionResult): Promise<string>;
}

export class InvalidTestIdError extends Error {
  readonly id: string;

  constructor(id: string) {
    super(`Invalid test id "${id}": use letters, digits, ".", "_" and "-"`);
    this.name = 'InvalidTestIdError';
    this.id = id;
  }
}

// ── Factory ──────────────────────────────────────────────────

const ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Test cases as `<dir>/<id>.json`, results beside them as
 * `<dir>/<id>.result.json`. Loading validates; saving writes the canonical
 * form, so an unchanged test case is rewritten byte for byte.
 */
export function createFileStore(dir: string): TestCaseStore {
  const resolve = (id: string, suffix: string): string => {
    if (!ID_PATTERN.test(id) || id.includes('..')) throw new InvalidTestIdError(id);
    return path.join(dir, `${id}${suffix}`);
  };

  return {
    dir,

    pathFor(id: string): string {
      return resolve(id, '.json');
    },

    async loadTestCase(id: string): Promise<TestCase> {
      return loadTestCaseFile(resolve(id, '.json'));
    },

    async saveTestCase(id: string, testCase: TestCase): Promise<string> {
      const file = resolve(id, '.json');
      await mkdir(dir, { recursive: true });
      await writeFile(file, serializeTestCase(testCase) + '\n', 'utf-8');
      return file;
    },

    async saveExecutionResult(id: string, result: ExecutionResult): Promise<string> {
      const file = resolve(id, '.result.json');
      await mkdir(dir, { recursive: true });
      await writeFile(file, JSON.stringify(parseExecutionResult(result), null, 2) + '\n', 'utf-8');
      return file;
    },
  };
}

export async function loadTestCaseFile(file: string): Promise<TestCase> {
  const raw = await readFile(file, 'utf-8');
  return parseTestCaseJSON(raw);
}

/** `login-flow` from "Login Flow!"; never empty. */
export function toTestId(name: string): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug.length > 0 ? slug : 'test';
}
