import { describe, expect, it } from 'vitest';
import { HttpGameCenterClient } from '../src/services/game-center.js';
import { silentLogger } from './helpers/fixtures.js';

function stubFetch(status: number, body: unknown) {
  const urls: string[] = [];
  const impl: typeof fetch = async (input) => {
    urls.push(String(input));
    return new Response(JSON.stringify(body), { status });
  };
  return { impl, urls };
}

function client(impl: typeof fetch): HttpGameCenterClient {
  return new HttpGameCenterClient({
    baseUrl: 'http://game-center.test/games/',
    timeoutMs: 1000,
    logger: silentLogger,
    fetch: impl,
  });
}

describe('HttpGameCenterClient', () => {
  it('reads a record and fills in missing sections', async () => {
    const { impl, urls } = stubFetch(200, {
      code: 200,
      success: true,
      result: { recordData: { gameInfo: { stadium: 'Jamsil' }, etcRecords: [{ how: '결승타', result: 'Moon' }] } },
    });
    const record = await client(impl).getRecord('20250920OBLG0');

    expect(urls).toEqual(['http://game-center.test/games/20250920OBLG0/record']);
    expect(record).toEqual({
      gameInfo: { stadium: 'Jamsil' },
      scoreBoard: {},
      pitchersBoxscore: {},
      etcRecords: [{ how: '결승타', result: 'Moon' }],
    });
  });

  it('reads a preview', async () => {
    const { impl, urls } = stubFetch(200, {
      code: 200,
      result: { previewData: { homeStarter: { playerInfo: { name: 'Park Ace' } } } },
    });
    const preview = await client(impl).getPreview('g4');

    expect(urls).toEqual(['http://game-center.test/games/g4/preview']);
    expect(preview?.homeStarter?.playerInfo?.name).toBe('Park Ace');
  });

  it('returns null for an error status', async () => {
    const { impl } = stubFetch(503, { message: 'unavailable' });
    expect(await client(impl).getRecord('g1')).toBeNull();
  });

  it('returns null when the envelope reports no data', async () => {
    const { impl } = stubFetch(200, { code: 404, result: null });
    expect(await client(impl).getPreview('g1')).toBeNull();
  });

  it('returns null for an unexpected shape', async () => {
    const { impl } = stubFetch(200, { code: 'ok' });
    expect(await client(impl).getRecord('g1')).toBeNull();
  });

  it('returns null when the request itself fails', async () => {
    const failing: typeof fetch = async () => {
      throw new TypeError('fetch failed');
    };
    expect(await client(failing).getPreview('g1')).toBeNull();
  });
});
