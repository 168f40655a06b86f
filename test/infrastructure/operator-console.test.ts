import { PassThrough } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { createOperatorConsole } from '../../src/infrastructure/operator-console.js';

function streams() {
  const input = new PassThrough();
  const output = new PassThrough();
  const written: string[] = [];
  output.on('data', (chunk: Buffer) => written.push(chunk.toString()));
  return { input, output, written };
}

describe('createOperatorConsole', () => {
  it('writes status lines with a trailing newline', () => {
    const { input, output, written } = streams();
    const operator = createOperatorConsole(input, output);

    operator.line('[OK] Renamed to: 2024-03-10 - IRS - Tax Form.png (1.2s)');
    operator.write('\r[...] Processing: a.pdf... 3s');

    expect(written).toEqual([
      '[OK] Renamed to: 2024-03-10 - IRS - Tax Form.png (1.2s)\n',
      '\r[...] Processing: a.pdf... 3s',
    ]);
  });

  it('returns the answer typed at the prompt', async () => {
    const { input, output } = streams();
    const operator = createOperatorConsole(input, output);

    const answer = operator.ask('Pick: ');
    input.write('1,3\n');

    expect(await answer).toBe('1,3');
  });

  it('rejects when the prompt is aborted', async () => {
    const { input, output } = streams();
    const operator = createOperatorConsole(input, output);
    const controller = new AbortController();
    controller.abort();

    await expect(operator.ask('Pick: ', controller.signal)).rejects.toMatchObject({ name: 'AbortError' });
  });
});
