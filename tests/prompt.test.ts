import { PassThrough } from 'stream';
import { describe, expect, it } from 'vitest';
import { createPrompter, parseYesNo } from '../src/prompt.js';

const tick = () => new Promise((resolve) => setImmediate(resolve));

describe('parseYesNo', () => {
  it.each([
    ['y', true],
    ['YES', true],
    [' n ', false],
    ['no', false],
    ['', false],
  ])('%j -> %s', (answer, expected) => {
    expect(parseYesNo(answer)).toBe(expected);
  });

  it('leaves anything else undecided', () => {
    expect(parseYesNo('maybe')).toBeUndefined();
  });
});

describe('createPrompter', () => {
  function streams() {
    const input = new PassThrough();
    const output = new PassThrough();
    const written: string[] = [];
    output.on('data', (c: Buffer) => written.push(c.toString()));
    return { input, output, written: () => written.join('') };
  }

  it('returns the fallback for a blank answer', async () => {
    const s = streams();
    const prompter = createPrompter(s.input, s.output);
    const answer = prompter.ask('Region', 'us-east-1');
    await tick();
    s.input.write('\n');
    expect(await answer).toBe('us-east-1');
    expect(s.written()).toContain('Region [us-east-1]: ');
    prompter.close();
  });

  it('asks again until the answer is yes or no', async () => {
    const s = streams();
    const prompter = createPrompter(s.input, s.output);
    const answer = prompter.confirm('Continue?');
    await tick();
    s.input.write('maybe\n');
    await tick();
    s.input.write('y\n');
    expect(await answer).toBe(true);
    expect(s.written()).toContain('Please answer y or n.');
    prompter.close();
  });

  it('declines a pending confirmation when input ends', async () => {
    const s = streams();
    const prompter = createPrompter(s.input, s.output);
    const answer = prompter.confirm('Continue?');
    await tick();
    s.input.end();
    expect(await answer).toBe(false);
  });

  it('answers with the fallback once input has ended', async () => {
    const s = streams();
    const prompter = createPrompter(s.input, s.output);
    s.input.end();
    await tick();
    expect(await prompter.ask('Region', 'us-east-1')).toBe('us-east-1');
    expect(await prompter.confirm('Continue?')).toBe(false);
    prompter.close();
  });
});
