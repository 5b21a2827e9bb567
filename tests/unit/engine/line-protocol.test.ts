/**
 * Unit tests for the engine line protocol
 */

import { describe, it, expect } from 'vitest';
import { PassThrough } from 'stream';
import { answerLine, serveLines } from '../../../src/engine/line-protocol.js';
import { LayoutRejectedError, MissingIdError } from '../../../src/shared/errors.js';
import { READY_MARKER } from '../../../src/shared/protocol.js';

const echoId = async (document: unknown): Promise<unknown> => {
  if (typeof document === 'object' && document !== null && 'id' in document) {
    return { answered: document.id };
  }
  throw new LayoutRejectedError('graph must be a JSON object');
};

async function collect(stream: PassThrough): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

describe('line protocol', () => {
  describe('answerLine', () => {
    it('answers with the handler result as one JSON line', async () => {
      expect(await answerLine('{"id":"g"}', echoId)).toBe('{"answered":"g"}');
    });

    it('answers invalid JSON with an $error line', async () => {
      const answer = await answerLine('{"id":', echoId);

      expect(answer).toMatch(/^\{"\$error":"invalid JSON: .*","kind":"rejected"\}$/);
    });

    it('answers refusals with a rejected $error line', async () => {
      expect(await answerLine('[1,2]', echoId)).toBe(
        '{"$error":"graph must be a JSON object","kind":"rejected"}'
      );
    });

    it('counts structural errors as refusals', async () => {
      const answer = await answerLine('{}', async () => {
        throw new MissingIdError('node', 'root/children[0]');
      });

      expect(answer).toBe('{"$error":"Missing id on node at root/children[0]","kind":"rejected"}');
    });

    it('marks engine failures apart from refusals', async () => {
      const answer = await answerLine('{}', async () => {
        throw new Error('kernel crashed: out of memory');
      });

      expect(answer).toBe('{"$error":"kernel crashed: out of memory","kind":"failure"}');
    });
  });

  describe('serveLines', () => {
    it('announces itself, then answers every request line in order', async () => {
      const input = new PassThrough();
      const output = new PassThrough();
      const written = collect(output);

      const serving = serveLines(input, output, echoId);
      input.write('{"id":"a"}\n\n');
      input.write('not json\n{"id":"b"}\n');
      input.end('[]\n');
      await serving;
      output.end();

      const lines = (await written).split('\n');
      expect(lines[0]).toBe(READY_MARKER);
      expect(lines[1]).toBe('{"answered":"a"}');
      expect(lines[2]).toMatch(/^\{"\$error":"invalid JSON: .*","kind":"rejected"\}$/);
      expect(lines.slice(3)).toEqual([
        '{"answered":"b"}',
        '{"$error":"graph must be a JSON object","kind":"rejected"}',
        '',
      ]);
    });
  });
});
