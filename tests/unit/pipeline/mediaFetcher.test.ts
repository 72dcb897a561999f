/**
 * MediaFetcher Unit Tests
 *
 * - Primary download wins when it leaves a non-empty file
 * - The fallback runs exactly once, only after the primary fails
 * - A zero-exit primary with no file still counts as a failure
 * - Both diagnostics are kept when both strategies fail
 * - An aborted primary download never starts the fallback
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  argAfter,
  downloadingCurl,
  downloadingYtDlp,
  failingCurl,
  failingYtDlp,
  fakeExecFile,
  hangingTool,
} from '../../helpers/fakeTools.js';

const { mockExecFile } = vi.hoisted(() => ({
  mockExecFile: vi.fn(),
}));

vi.mock('child_process', () => ({
  execFile: mockExecFile,
}));

import { MediaFetcher } from '../../../src/pipeline/MediaFetcher.js';
import { CancelledError, FetchError, WorkspaceError } from '../../../src/shared/errors.js';

const SHARE_URL = 'https://www.loom.com/share/abc123XYZ';

function commandsRun(): string[] {
  return mockExecFile.mock.calls.map((call) => call[0]);
}

describe('MediaFetcher', () => {
  let workDir: string;
  let fetcher: MediaFetcher;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'framevault-fetch-'));
    fetcher = new MediaFetcher({
      workDir: undefined,
      fallbackUrlTemplate: 'https://cdn.example.test/{id}.mp4',
      tools: { ytDlp: 'yt-dlp', curl: 'curl', ffmpeg: 'ffmpeg', ffprobe: 'ffprobe' },
    });
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  it('returns the primary download when yt-dlp succeeds', async () => {
    mockExecFile.mockImplementation(fakeExecFile({ 'yt-dlp': downloadingYtDlp(2048), curl: downloadingCurl() }));

    const result = await fetcher.fetch(SHARE_URL, { workDir });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.strategy).toBe('primary');
    expect(result.value.sizeBytes).toBe(2048);
    expect(result.value.path.startsWith(join(workDir, 'media_'))).toBe(true);
    expect(result.value.path.endsWith('.mp4')).toBe(true);
    expect(commandsRun()).toEqual(['yt-dlp']);
  });

  it('invokes yt-dlp with verbose best-format download into the work dir', async () => {
    mockExecFile.mockImplementation(fakeExecFile({ 'yt-dlp': downloadingYtDlp() }));

    await fetcher.fetch(SHARE_URL, { workDir });

    const args: string[] = mockExecFile.mock.calls[0][1];
    expect(args.slice(0, 3)).toEqual(['--verbose', '-f', 'best']);
    expect(argAfter(args, '-o').startsWith(workDir)).toBe(true);
    expect(args[args.length - 1]).toBe(SHARE_URL);
  });

  it('falls back to the direct URL exactly once when yt-dlp fails', async () => {
    mockExecFile.mockImplementation(fakeExecFile({ 'yt-dlp': failingYtDlp(), curl: downloadingCurl(512) }));

    const result = await fetcher.fetch(SHARE_URL, { workDir });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.strategy).toBe('fallback');
    expect(result.value.sizeBytes).toBe(512);
    expect(result.value.path.startsWith(join(workDir, 'media_direct_'))).toBe(true);
    expect(commandsRun()).toEqual(['yt-dlp', 'curl']);

    const curlArgs: string[] = mockExecFile.mock.calls[1][1];
    expect(curlArgs[curlArgs.length - 1]).toBe('https://cdn.example.test/abc123XYZ.mp4');
    expect(curlArgs).toContain('--fail');
  });

  it('treats a zero-exit yt-dlp that wrote nothing as a failure', async () => {
    mockExecFile.mockImplementation(
      fakeExecFile({ 'yt-dlp': () => ({ stderr: 'nothing to do' }), curl: downloadingCurl() })
    );

    const result = await fetcher.fetch(SHARE_URL, { workDir });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.strategy).toBe('fallback');
  });

  it('treats an empty primary file as a failure', async () => {
    mockExecFile.mockImplementation(
      fakeExecFile({
        'yt-dlp': (args) => {
          writeFileSync(argAfter(args, '-o'), '');
          return {};
        },
        curl: downloadingCurl(),
      })
    );

    const result = await fetcher.fetch(SHARE_URL, { workDir });

    expect(result.ok && result.value.strategy).toBe('fallback');
  });

  it('keeps both diagnostics when both strategies fail', async () => {
    mockExecFile.mockImplementation(
      fakeExecFile({
        'yt-dlp': failingYtDlp('ERROR: Unsupported URL'),
        curl: failingCurl('curl: (22) 404'),
      })
    );

    const result = await fetcher.fetch(SHARE_URL, { workDir });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(FetchError);
    if (!(result.error instanceof FetchError)) return;
    expect(result.error.primaryDiagnostic).toBe('ERROR: Unsupported URL');
    expect(result.error.fallbackDiagnostic).toBe('curl: (22) 404');
    expect(result.error.diagnostic).toBe('primary:\nERROR: Unsupported URL\nfallback:\ncurl: (22) 404');
    expect(result.error.stage).toBe('fetching');
  });

  it('skips the fallback when no identifier can be derived', async () => {
    mockExecFile.mockImplementation(fakeExecFile({ 'yt-dlp': failingYtDlp('ERROR: no video') }));

    const result = await fetcher.fetch('https://example.test/watch?v=1', { workDir });

    expect(result.ok).toBe(false);
    if (result.ok || !(result.error instanceof FetchError)) return;
    expect(result.error.fallbackDiagnostic).toBe(
      'Could not extract a video ID from the source reference: https://example.test/watch?v=1'
    );
    expect(commandsRun()).toEqual(['yt-dlp']);
  });

  it('does not start curl when yt-dlp is killed by abort', async () => {
    mockExecFile.mockImplementation(fakeExecFile({ 'yt-dlp': hangingTool(), curl: downloadingCurl() }));

    const pending = fetcher.fetch(SHARE_URL, { workDir });
    await vi.waitFor(() => expect(mockExecFile).toHaveBeenCalledOnce());
    fetcher.abort();
    const result = await pending;

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(CancelledError);
    expect(result.error.message).toBe('Run cancelled during fetching');
    expect(commandsRun()).toEqual(['yt-dlp']);
  });

  it('reports a missing yt-dlp binary through the spawn error', async () => {
    mockExecFile.mockImplementation(fakeExecFile({ curl: failingCurl('curl: (6) Could not resolve host') }));

    const result = await fetcher.fetch(SHARE_URL, { workDir });

    expect(result.ok).toBe(false);
    if (result.ok || !(result.error instanceof FetchError)) return;
    expect(result.error.primaryDiagnostic).toBe('spawn yt-dlp ENOENT');
  });

  it('fails with a workspace error when the work dir cannot be created', async () => {
    const blocker = join(workDir, 'not-a-dir');
    writeFileSync(blocker, 'x');

    const result = await fetcher.fetch(SHARE_URL, { workDir: join(blocker, 'child') });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(WorkspaceError);
    expect(mockExecFile).not.toHaveBeenCalled();
  });
});
