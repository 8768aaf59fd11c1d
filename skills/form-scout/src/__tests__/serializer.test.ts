import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ZodError } from 'zod';
import { WriteError } from '../errors';
import { parsePageResult, saveResult, toJson } from '../serializer';
import type { PageResult } from '../types';
import { failedResult, loginResult } from './helpers/results';

describe('toJson', () => {
  test('writes keys in the fixed document order', () => {
    const scrambled: PageResult = {
      error: null,
      screenshots: [],
      forms: [
        {
          submit_button: 'Go',
          fields: [
            { placeholder: 'p', options: [], required: false, label: 'l', type: 'text', id: 'i', name: 'n' },
          ],
          id: 'f',
          name: 'form',
        },
      ],
      url: 'http://localhost:5174',
      success: true,
    };

    const doc = JSON.parse(toJson(scrambled));

    expect(Object.keys(doc)).toEqual(['success', 'url', 'forms', 'screenshots', 'error']);
    expect(Object.keys(doc.forms[0])).toEqual(['name', 'id', 'fields', 'submit_button']);
    expect(Object.keys(doc.forms[0].fields[0])).toEqual([
      'name',
      'id',
      'type',
      'label',
      'required',
      'options',
      'placeholder',
    ]);
  });

  test('keeps error as null on success and as text on failure', () => {
    expect(JSON.parse(toJson(loginResult())).error).toBeNull();
    expect(JSON.parse(toJson(failedResult())).error).toBe(failedResult().error);
  });

  test('indents with two spaces by default', () => {
    expect(toJson(failedResult()).split('\n')[1]).toBe('  "success": false,');
    expect(toJson(failedResult(), 0)).not.toContain('\n');
  });
});

describe('parsePageResult', () => {
  test('parses serialized results back into an equal structure', () => {
    expect(parsePageResult(toJson(loginResult()))).toEqual(loginResult());
    expect(parsePageResult(toJson(failedResult()))).toEqual(failedResult());
  });

  test('rejects documents without the result shape', () => {
    expect(() => parsePageResult('{"success": true}')).toThrow(ZodError);
    expect(() => parsePageResult(toJson(loginResult()).replace('"email"', '"e-mail"'))).not.toThrow();
    expect(() => parsePageResult(toJson(loginResult()).replace('"type": "email"', '"type": "phone"'))).toThrow(
      ZodError,
    );
  });
});

describe('saveResult', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'form-scout-out-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('writes UTF-8 JSON and creates parent directories', () => {
    const path = join(dir, 'nested', 'deeper', 'form-analysis.json');

    saveResult(loginResult(), path);

    expect(readFileSync(path, 'utf-8')).toBe(toJson(loginResult()) + '\n');
  });

  test('keeps non-ASCII labels intact', () => {
    const result = loginResult();
    result.forms[0].fields[0].label = 'Adresse e-mail (requise) ✓';
    const path = join(dir, 'unicode.json');

    saveResult(result, path);

    expect(parsePageResult(readFileSync(path, 'utf-8')).forms[0].fields[0].label).toBe(
      'Adresse e-mail (requise) ✓',
    );
  });

  test('raises WriteError when the target is not writable', () => {
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory');
    const path = join(blocker, 'form-analysis.json');

    expect(() => saveResult(loginResult(), path)).toThrow(WriteError);
    expect(() => saveResult(loginResult(), path)).toThrow(`Failed to write ${path}:`);
  });
});
