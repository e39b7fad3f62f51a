/**
 * Unit tests for the readline dialog
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import { ReadlineDialog } from '../../../src/dialog/readline-dialog.js';

describe('ReadlineDialog', () => {
  let input: PassThrough;
  let output: PassThrough;
  let written: string;
  let dialog: ReadlineDialog;

  beforeEach(() => {
    input = new PassThrough();
    output = new PassThrough();
    written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString();
    });
    dialog = new ReadlineDialog({ input, output });
  });

  afterEach(() => {
    dialog.close();
  });

  describe('select', () => {
    const options = ['alpha', 'beta', 'gamma'];

    it('returns the index of a numbered choice', async () => {
      const answer = dialog.select('Pick one', 'help text', options);
      input.write('2\n');

      expect(await answer).toBe(1);
      expect(written).toContain('Pick one');
      expect(written).toContain('help text');
    });

    it('returns null when the operator quits', async () => {
      const answer = dialog.select('Pick one', '', options);
      input.write('q\n');

      expect(await answer).toBeNull();
    });

    it('filters the options by typed text', async () => {
      const answer = dialog.select('Pick one', '', options);
      input.write('bet\n1\n');

      expect(await answer).toBe(1);
    });

    it('asks again for a number out of range', async () => {
      const answer = dialog.select('Pick one', '', options);
      input.write('7\n3\n');

      expect(await answer).toBe(2);
      expect(written).toContain('No option 7');
    });

    it('returns null when the input ends', async () => {
      const answer = dialog.select('Pick one', '', options);
      input.end();

      expect(await answer).toBeNull();
    });
  });

  describe('text', () => {
    it('falls back to the initial value on a blank line', async () => {
      const answer = dialog.text('Configuration file', '', 'crate-fusion.toml');
      input.write('\n');

      expect(await answer).toBe('crate-fusion.toml');
    });

    it('returns the typed value trimmed', async () => {
      const answer = dialog.text('Configuration file', '', 'crate-fusion.toml');
      input.write('  custom.toml \n');

      expect(await answer).toBe('custom.toml');
    });
  });

  describe('confirm', () => {
    it('uses the default for a blank answer', async () => {
      const answer = dialog.confirm('Save?', true);
      input.write('\n');

      expect(await answer).toBe(true);
    });

    it('reads yes and no', async () => {
      const first = dialog.confirm('Save?', false);
      input.write('yes\n');
      expect(await first).toBe(true);

      const second = dialog.confirm('Overwrite?', true);
      input.write('n\n');
      expect(await second).toBe(false);
    });
  });
});
