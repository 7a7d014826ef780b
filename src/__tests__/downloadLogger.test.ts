import type { RelocationResult } from '../types/reconcile';

const withEnv = async (env: Record<string, string>) => {
  Object.assign(process.env, env);
  const module = await import('../utils/downloadLogger');
  return module;
};

const captureLog = () => {
  const logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  return () => logSpy.mock.calls.map((call) => call.join(' ')).join('\n');
};

describe('downloadLogger', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    jest.resetModules();
    jest.restoreAllMocks();
    process.env = { ...originalEnv };
  });

  it('stays quiet unless verbose logging is enabled', async () => {
    const { logVerifyResult } = await withEnv({ HARVEST_LOG_VERBOSE: 'false', NODE_ENV: 'test' });
    const output = captureLog();

    logVerifyResult({ status: 'completed', filePath: '/downloads/model.zip', elapsedMs: 1200 });

    expect(output()).toBe('');
  });

  it('reports a completed download with its wait time', async () => {
    const { logVerifyResult } = await withEnv({ HARVEST_LOG_VERBOSE: 'true', NODE_ENV: 'test' });
    const output = captureLog();

    logVerifyResult({ status: 'completed', filePath: '/downloads/model.zip', elapsedMs: 1200 });

    const text = output();
    expect(text).toContain('Download complete and stable');
    expect(text).toContain('model.zip');
    expect(text).toContain('Waited: 1.20 s');
  });

  it('names the phase and candidate of a timeout', async () => {
    const { logVerifyResult } = await withEnv({ HARVEST_LOG_VERBOSE: '1', NODE_ENV: 'test' });
    const output = captureLog();

    logVerifyResult({ status: 'timed-out', phase: 'stability', candidatePath: '/downloads/a.zip', elapsedMs: 25000 });

    const text = output();
    expect(text).toContain('Phase: stability');
    expect(text).toContain('Waited: 25.0 s');
    expect(text).toContain('Unsettled candidate: /downloads/a.zip');
  });

  it('truncates long baselines', async () => {
    const { logVerifyStart } = await withEnv({ HARVEST_LOG_VERBOSE: 'true', NODE_ENV: 'test' });
    const output = captureLog();

    logVerifyStart(
      '/downloads',
      Array.from({ length: 12 }, (_, index) => `file-${index}.stl`),
      60000,
    );

    expect(output()).toContain('file-7.stl … +4 more');
  });

  it('lists failed moves of a relocation', async () => {
    const { logRelocation } = await withEnv({ HARVEST_LOG_VERBOSE: 'true', NODE_ENV: 'test' });
    const output = captureLog();
    const result: RelocationResult = {
      sourceDir: '/tmp/files',
      destinationDir: '/out/files',
      moved: [{ from: '/tmp/files/a.stl', to: '/out/files/a.stl' }],
      failed: [{ from: '/tmp/files/b.stl', error: 'permission denied' }],
      paths: ['/out/files/a.stl'],
    };

    logRelocation(result);

    const text = output();
    expect(text).toContain('Moved with failures');
    expect(text).toContain('a.stl → /out/files/a.stl');
    expect(text).toContain('b.stl: permission denied');
  });

  it('prints download errors outside production only', async () => {
    const { logDownloadError } = await withEnv({ NODE_ENV: 'production' });
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});

    logDownloadError(new Error('boom'), { stage: 'file' });
    expect(errorSpy).not.toHaveBeenCalled();

    process.env.NODE_ENV = 'test';
    logDownloadError(new Error('boom'), { stage: 'file', url: 'https://example.test/model/1' });
    const text = errorSpy.mock.calls.map((call) => call.join(' ')).join('\n');
    expect(text).toContain('Download flow error');
    expect(text).toContain('Stage: file');
    expect(text).toContain('boom');
  });
});
