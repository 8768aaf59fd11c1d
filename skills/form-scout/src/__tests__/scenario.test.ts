import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ZodError } from 'zod';
import {
  cssSelector,
  generateScenario,
  loadScenario,
  parseScenario,
  renderScenario,
} from '../scenario';
import type { PageResult } from '../types';
import { failedResult, field, loginResult } from './helpers/results';

describe('generateScenario', () => {
  test('fills and submits the login form', () => {
    expect(generateScenario(loginResult())).toEqual({
      name: 'Fill forms on http://localhost:5174/login',
      onError: 'stop',
      steps: [
        { goto: 'http://localhost:5174/login' },
        { fill: { selector: '#email', value: 'user@example.com' } },
        { fill: { selector: '#password', value: 'example-password' } },
        { click: { text: 'Log In' } },
      ],
    });
  });

  test('uses select and check steps for choice fields', () => {
    const result: PageResult = {
      ...loginResult(),
      forms: [
        {
          name: '',
          id: 'prefs',
          fields: [
            field({ name: 'country', type: 'select', options: ['Canada'] }),
            field({ id: 'plan-basic', name: 'plan', type: 'radio', options: ['basic', 'pro'] }),
            field({ name: 'terms', type: 'checkbox', options: ['on'] }),
            field({ label: 'Unaddressable' }),
          ],
          submit_button: 'Save',
        },
      ],
    };

    expect(generateScenario(result).steps.slice(1)).toEqual([
      { select: { selector: '[name="country"]', option: 'Canada' } },
      { check: '#plan-basic' },
      { check: '[name="terms"]' },
      { click: { text: 'Save' } },
    ]);
  });

  test('has no steps for a failed result', () => {
    const scenario = generateScenario(failedResult());
    expect(scenario.steps).toEqual([]);
    expect(scenario.description).toBe(
      'Analysis failed: Failed to navigate to http://unreachable.invalid: net::ERR_NAME_NOT_RESOLVED',
    );
  });
});

describe('cssSelector', () => {
  test('uses #id for plain ids', () => {
    expect(cssSelector({ id: 'email', name: 'user_email' })).toBe('#email');
  });

  test('quotes ids that are not plain identifiers', () => {
    expect(cssSelector({ id: 'user.email', name: '' })).toBe('[id="user.email"]');
    expect(cssSelector({ id: '1st', name: '' })).toBe('[id="1st"]');
  });

  test('falls back to the name attribute', () => {
    expect(cssSelector({ id: '', name: 'user[email]' })).toBe('[name="user[email]"]');
    expect(cssSelector({ id: '', name: 'say "hi"' })).toBe('[name="say \\"hi\\""]');
  });

  test('returns null without id or name', () => {
    expect(cssSelector({ id: '', name: '' })).toBeNull();
  });
});

describe('scenario files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'form-scout-scenario-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('rendered scenarios load back unchanged', () => {
    const scenario = generateScenario(loginResult());
    const path = join(dir, 'login.yaml');
    writeFileSync(path, renderScenario(scenario));

    expect(loadScenario(path)).toEqual(scenario);
  });

  test('parses hand-written scenarios', () => {
    const scenario = parseScenario(
      [
        'name: Contact',
        'variables:',
        '  email: ${CONTACT_EMAIL:-test@example.com}',
        'steps:',
        '  - goto: http://localhost:5174/contact',
        '  - fill:',
        '      "#email": "{{email}}"',
        '      "#message": Hello',
        '  - wait:',
        '      ms: 250',
        '  - click: button[type=submit]',
        '    onError: continue',
      ].join('\n'),
    );

    expect(scenario.variables).toEqual({ email: '${CONTACT_EMAIL:-test@example.com}' });
    expect(scenario.steps).toEqual([
      { goto: 'http://localhost:5174/contact' },
      { fill: { '#email': '{{email}}', '#message': 'Hello' } },
      { wait: { ms: 250 } },
      { click: 'button[type=submit]', onError: 'continue' },
    ]);
  });

  test('rejects scenarios without steps', () => {
    expect(() => parseScenario('name: Broken\n')).toThrow(ZodError);
  });
});
