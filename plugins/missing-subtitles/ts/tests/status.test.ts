import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { loadConfig } from '../src/config.js';
import { isReady, StatusChecker } from '../src/status.js';
import type { CatalogDiagnostics } from '../src/status.js';
import type { ApiKeyCheck, CatalogSession, QuotaSnapshot } from '../src/types.js';
import { episode, FakeLibrary, MemoryStorage, movie } from './helpers.js';

class FakeDiagnostics implements CatalogDiagnostics {
  session: CatalogSession = { token: null, remainingDownloads: null };
  apiKey: ApiKeyCheck = { status: 'valid', httpStatus: 200, rateLimitRemaining: '39', rateLimitLimit: '40' };
  loginSucceeds = true;
  quota: QuotaSnapshot | null = { remaining: 18, resetTime: '5 hours' };

  async verifyApiKey(): Promise<ApiKeyCheck> {
    return this.apiKey;
  }

  async login(): Promise<boolean> {
    if (this.loginSucceeds) {
      this.session = { ...this.session, token: 'tok', level: 'Sub leecher', allowedDownloads: 20 };
    }
    return this.loginSucceeds;
  }

  async probeQuota(): Promise<QuotaSnapshot | null> {
    return this.quota;
  }
}

const localEnv = {
  PLEX_TOKEN: 'plex-test-token',
  OPENSUBTITLES_API_KEY: 'test-api-key',
  OPENSUBTITLES_USERNAME: 'test-user',
  OPENSUBTITLES_PASSWORD: 'test-secret',
};

function library() {
  return new FakeLibrary([{ section: { key: '1', title: 'Movies', type: 'movie' }, items: [movie('1', 'Heat')] }]);
}

describe('StatusChecker', () => {
  it('reports a fully working local setup as ready', async () => {
    const checker = new StatusChecker({
      config: loadConfig(localEnv),
      storage: new MemoryStorage(),
      library: library(),
      catalog: new FakeDiagnostics(),
    });

    const report = await checker.checkAll();

    assert.equal(isReady(report), true);
    assert.deepEqual(report.warnings, []);
    assert.deepEqual(report.info, [
      'PLEX_URL: http://localhost:32400',
      'PLEX_TOKEN: plex*******oken',
      'Method: local',
      'Languages: en',
      'OPENSUBTITLES_API_KEY: test****-key',
      'OPENSUBTITLES_USERNAME: test-user',
      'Plex server: Test Server (version 1.40.0, Linux)',
      'Libraries: 1 movie, 0 TV',
      '  Movies: 1 movie',
      'Write permission OK: /media/movies',
      'OpenSubtitles API key is valid',
      'API rate limit: 39/40 requests remaining',
      'OpenSubtitles login OK (level: Sub leecher, daily downloads: 20)',
      'Downloads remaining today: 18',
      'Quota resets in: 5 hours',
    ]);
  });

  it('flags missing credentials and an unreachable Plex server', async () => {
    const failingLibrary = library();
    failingLibrary.getServerInfo = async () => {
      throw new Error('connect ECONNREFUSED');
    };
    const checker = new StatusChecker({
      config: loadConfig({ PLEX_TOKEN: 'plex-test-token' }),
      storage: new MemoryStorage(),
      library: failingLibrary,
    });

    const report = await checker.checkAll();

    assert.equal(isReady(report), false);
    assert.deepEqual(report.issues, [
      'OPENSUBTITLES_API_KEY is required for the local method',
      'OPENSUBTITLES_USERNAME and OPENSUBTITLES_PASSWORD are required for the local method',
      'Cannot connect to Plex at http://localhost:32400: connect ECONNREFUSED',
    ]);
  });

  it('flags an unwritable media directory', async () => {
    const storage = new MemoryStorage();
    storage.writable = false;
    const checker = new StatusChecker({
      config: loadConfig(localEnv),
      storage,
      library: library(),
      catalog: new FakeDiagnostics(),
    });

    const report = await checker.checkAll();

    assert.deepEqual(report.issues, ['No write permission in /media/movies (needed to save subtitle files)']);
  });

  it('flags an invalid API key and a failed login', async () => {
    const catalog = new FakeDiagnostics();
    catalog.apiKey = { status: 'invalid', httpStatus: 401 };
    catalog.loginSucceeds = false;
    const checker = new StatusChecker({
      config: loadConfig(localEnv),
      storage: new MemoryStorage(),
      library: library(),
      catalog,
    });

    const report = await checker.checkAll();

    assert.deepEqual(report.issues, [
      'OpenSubtitles API key is invalid',
      'OpenSubtitles login failed, check username and password',
    ]);
  });

  it('warns when the daily quota is used up', async () => {
    const catalog = new FakeDiagnostics();
    catalog.quota = { remaining: 0 };
    const checker = new StatusChecker({
      config: loadConfig(localEnv),
      storage: new MemoryStorage(),
      library: library(),
      catalog,
    });

    const report = await checker.checkAll();

    assert.deepEqual(report.warnings, ['Daily download quota is used up']);
    assert.equal(isReady(report), true);
  });

  it('counts movies and shows per library', async () => {
    const checker = new StatusChecker({
      config: loadConfig({ PLEX_TOKEN: 'plex-test-token', SUBTITLE_METHOD: 'delegated' }),
      storage: new MemoryStorage(),
      library: new FakeLibrary([
        { section: { key: '1', title: 'Movies', type: 'movie' }, items: [movie('1', 'Heat'), movie('2', 'Ronin')] },
        {
          section: { key: '2', title: 'TV Shows', type: 'show' },
          items: [episode('10', 'Lost', 1, 1), episode('11', 'Lost', 1, 2), episode('20', 'Fargo', 1, 1)],
        },
        { section: { key: '3', title: 'Music', type: 'artist' }, items: [] },
      ]),
    });

    const report = await checker.checkAll();

    assert.deepEqual(report.info.slice(5, 8), ['Libraries: 1 movie, 1 TV', '  Movies: 2 movies', '  TV Shows: 2 shows']);
  });

  it('skips catalog checks for the delegated method', async () => {
    const checker = new StatusChecker({
      config: loadConfig({ PLEX_TOKEN: 'plex-test-token', SUBTITLE_METHOD: 'delegated' }),
      storage: new MemoryStorage(),
      library: library(),
    });

    const report = await checker.checkAll();

    assert.equal(isReady(report), true);
    assert.equal(
      report.info[report.info.length - 1],
      'Delegated method: Plex fetches subtitles itself, OpenSubtitles is not contacted',
    );
  });
});
