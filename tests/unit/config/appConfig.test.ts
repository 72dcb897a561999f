/**
 * AppConfig Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  DEFAULT_FALLBACK_URL_TEMPLATE,
  DEFAULT_UPLOAD_CONCURRENCY,
  loadConfig,
  withDriveOverrides,
} from '../../../src/config/AppConfig.js';
import { ConfigError } from '../../../src/shared/errors.js';

const SERVICE_ACCOUNT_KEY = JSON.stringify({
  type: 'service_account',
  client_email: 'uploader@example.test',
  private_key: 'test-secret',
  project_id: 'demo-project',
});

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    const result = loadConfig({});

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual({
      workDir: undefined,
      uploadConcurrency: DEFAULT_UPLOAD_CONCURRENCY,
      fallbackUrlTemplate: DEFAULT_FALLBACK_URL_TEMPLATE,
      tools: { ytDlp: 'yt-dlp', curl: 'curl', ffmpeg: 'ffmpeg', ffprobe: 'ffprobe' },
      drive: { folderId: undefined, sharedDriveId: undefined, credentials: { source: 'none' } },
    });
  });

  it('returns a frozen config', () => {
    const result = loadConfig({});

    expect(result.ok && Object.isFrozen(result.value)).toBe(true);
    expect(result.ok && Object.isFrozen(result.value.drive)).toBe(true);
  });

  it('reads destination, workspace and tool overrides', () => {
    const result = loadConfig({
      GOOGLE_DRIVE_FOLDER_ID: ' folder-1 ',
      GOOGLE_SHARED_DRIVE_ID: 'drive-1',
      TEMP_DIR: '/var/tmp/framevault',
      FRAMEVAULT_UPLOAD_CONCURRENCY: '8',
      FFMPEG_PATH: '/opt/ffmpeg/bin/ffmpeg',
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.drive.folderId).toBe('folder-1');
    expect(result.value.drive.sharedDriveId).toBe('drive-1');
    expect(result.value.workDir).toBe('/var/tmp/framevault');
    expect(result.value.uploadConcurrency).toBe(8);
    expect(result.value.tools.ffmpeg).toBe('/opt/ffmpeg/bin/ffmpeg');
  });

  it('treats blank variables as unset', () => {
    const result = loadConfig({ GOOGLE_DRIVE_FOLDER_ID: '   ', TEMP_DIR: '' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.drive.folderId).toBeUndefined();
    expect(result.value.workDir).toBeUndefined();
  });

  it('parses an inline service account key in memory', () => {
    const result = loadConfig({ GOOGLE_APPLICATION_CREDENTIALS_JSON: SERVICE_ACCOUNT_KEY });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.drive.credentials).toEqual({
      source: 'json',
      key: { clientEmail: 'uploader@example.test', privateKey: 'test-secret', projectId: 'demo-project' },
    });
  });

  it('prefers the inline key over a key file', () => {
    const result = loadConfig({
      GOOGLE_APPLICATION_CREDENTIALS_JSON: SERVICE_ACCOUNT_KEY,
      GOOGLE_APPLICATION_CREDENTIALS: '/secrets/key.json',
    });

    expect(result.ok && result.value.drive.credentials.source).toBe('json');
  });

  it('uses a key file path when no inline key is set', () => {
    const result = loadConfig({ GOOGLE_APPLICATION_CREDENTIALS: '/secrets/key.json' });

    expect(result.ok && result.value.drive.credentials).toEqual({ source: 'file', keyFile: '/secrets/key.json' });
  });

  it('rejects inline credentials that are not JSON', () => {
    const result = loadConfig({ GOOGLE_APPLICATION_CREDENTIALS_JSON: '{not json' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ConfigError);
    expect(result.error.issues).toHaveLength(1);
    expect(result.error.issues[0].startsWith('GOOGLE_APPLICATION_CREDENTIALS_JSON: not valid JSON (')).toBe(true);
  });

  it('names the missing fields of an incomplete key', () => {
    const result = loadConfig({ GOOGLE_APPLICATION_CREDENTIALS_JSON: JSON.stringify({ client_email: 'a@b.test' }) });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toEqual(['GOOGLE_APPLICATION_CREDENTIALS_JSON.private_key: Required']);
  });

  it.each(['0', '17', 'many', '2.5'])('rejects upload concurrency %s', (value) => {
    const result = loadConfig({ FRAMEVAULT_UPLOAD_CONCURRENCY: value });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues[0].startsWith('FRAMEVAULT_UPLOAD_CONCURRENCY: ')).toBe(true);
  });

  it('requires an {id} placeholder in the fallback template', () => {
    const result = loadConfig({ FRAMEVAULT_FALLBACK_URL_TEMPLATE: 'https://cdn.example.test/video.mp4' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toEqual(['FRAMEVAULT_FALLBACK_URL_TEMPLATE: must contain an {id} placeholder']);
    expect(result.error.message).toBe(
      'Invalid configuration:\n  FRAMEVAULT_FALLBACK_URL_TEMPLATE: must contain an {id} placeholder'
    );
  });
});

describe('withDriveOverrides', () => {
  it('returns the same config when nothing is overridden', () => {
    const result = loadConfig({ GOOGLE_DRIVE_FOLDER_ID: 'folder-1' });
    if (!result.ok) throw result.error;

    expect(withDriveOverrides(result.value, {})).toBe(result.value);
  });

  it('replaces only the overridden destination fields', () => {
    const result = loadConfig({ GOOGLE_DRIVE_FOLDER_ID: 'folder-1', GOOGLE_SHARED_DRIVE_ID: 'drive-1' });
    if (!result.ok) throw result.error;

    const overridden = withDriveOverrides(result.value, { folderId: 'folder-2' });

    expect(overridden.drive.folderId).toBe('folder-2');
    expect(overridden.drive.sharedDriveId).toBe('drive-1');
    expect(result.value.drive.folderId).toBe('folder-1');
  });
});
