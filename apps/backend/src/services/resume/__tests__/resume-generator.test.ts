/**
 * End-to-end generation through the service with a scripted transport.
 */

import { describe, test, expect } from '@jest/globals';
import { loadGeneratorConfig } from '../../../lib/generator-config';
import { silentLogger } from '../../../lib/logger';
import { ResilientClient } from '../resilient-client';
import { ResumeGenerator, type GenerationResult } from '../resume-generator';
import { ScriptedTransport, VALID_HTML, baseInput, failure, makePng, success } from './fixtures';

const config = loadGeneratorConfig({ MAX_RETRIES: '0', MAX_BRIEF_LENGTH: '500' });

function generatorWith(transport: ScriptedTransport, retries = 0): ResumeGenerator {
  const client = new ResilientClient({
    transport,
    policy: { ...config.retry, maxAttempts: retries + 1, initialDelayMs: 1, maxDelayMs: 1 },
    apiTimeoutMs: 5_000,
    logger: silentLogger,
    sleep: async () => undefined,
  });
  return new ResumeGenerator({ config, client, logger: silentLogger });
}

function expectSucceeded(result: GenerationResult) {
  if (result.status !== 'succeeded') {
    throw new Error(`Expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result;
}

function expectFailed(result: GenerationResult) {
  if (result.status !== 'failed') {
    throw new Error('Expected a failed result');
  }
  return result.error;
}

describe('ResumeGenerator', () => {
  test('returns the validated document from a single attempt', async () => {
    const transport = new ScriptedTransport([success(VALID_HTML)]);
    const brief = Array.from({ length: 50 }, (_, i) => `skill${i}`).join(' ');

    const result = expectSucceeded(
      await generatorWith(transport).generate(baseInput({ briefText: brief, accentColor: '#336699' })),
    );

    expect(result).toMatchObject({ html: VALID_HTML, attempts: 1, model: 'gpt-4.1-mini' });
    expect(transport.calls).toBe(1);
    expect(transport.requests[0].contentBlocks).toEqual([
      { type: 'text', text: `${brief}\n\nPreferred accent color: #336699` },
    ]);
  });

  test('reports a non-HTML answer without retrying', async () => {
    const transport = new ScriptedTransport([success('Here is your résumé!')]);

    const error = expectFailed(await generatorWith(transport, 3).generate(baseInput()));

    expect(error.kind).toBe('InvalidHTMLResponse');
    expect(transport.calls).toBe(1);
  });

  test('reports input errors without calling the transport', async () => {
    const transport = new ScriptedTransport([success()]);

    const error = expectFailed(await generatorWith(transport).generate(baseInput({ briefText: 'a'.repeat(501) })));

    expect(error.kind).toBe('BriefTooLong');
    expect(transport.calls).toBe(0);
  });

  test('reports a corrupt oversized image as UnsupportedFormat', async () => {
    const full = await makePng(3000, 1500);
    const transport = new ScriptedTransport([success()]);

    const error = expectFailed(
      await generatorWith(transport).generate(
        baseInput({
          attachments: [{ bytes: full.subarray(0, Math.floor(full.byteLength / 2)), mimeType: 'image/png' }],
        }),
      ),
    );

    expect(error.kind).toBe('UnsupportedFormat');
    expect(transport.calls).toBe(0);
  });

  test('surfaces RetriesExhausted after the configured attempts', async () => {
    const transport = new ScriptedTransport([failure('RateLimited', 429)]);

    const error = expectFailed(await generatorWith(transport, 2).generate(baseInput()));

    expect(error).toMatchObject({ kind: 'RetriesExhausted', attempts: 3, lastFailure: { kind: 'RateLimited' } });
  });

  test('embeds the avatar and qr uploads into the document', async () => {
    const avatar = await makePng(32, 32);
    const qr = await makePng(16, 16);
    const transport = new ScriptedTransport([
      success('<!DOCTYPE html><html><body><img src="avatar.png"><img src="qr.png"></body></html>'),
    ]);

    const result = expectSucceeded(
      await generatorWith(transport).generate(
        baseInput({
          attachments: [
            { bytes: avatar, mimeType: 'image/png', filename: 'me.png', role: 'avatar' },
            { bytes: qr, mimeType: 'image/png', filename: 'linkedin.png', role: 'qr' },
          ],
        }),
      ),
    );

    expect(result.html).toBe(
      `<!DOCTYPE html><html><body><img src="data:image/png;base64,${avatar.toString('base64')}"><img src="data:image/png;base64,${qr.toString('base64')}"></body></html>`,
    );
    expect(transport.requests[0].contentBlocks.map((block) => block.type)).toEqual([
      'inline_image',
      'inline_image',
      'text',
    ]);
  });
});
