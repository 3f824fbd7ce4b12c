import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import {
    capForMode,
    clampDelaySeconds,
    getGmailCredentials,
    loadConfig,
    parseConfig,
    parseCount,
    parseSendMode,
} from '../../src/config';
import { ConfigError } from '../../src/errors';

const paths = { outputDir: '/tmp/out', markerPath: '/tmp/done.json', databasePath: ':memory:' };

describe('parseConfig', () => {
    it('fills in defaults', () => {
        const config = parseConfig(paths);

        expect(config).toMatchObject({
            subjectTemplate: 'Hello {Name}',
            labelName: 'Mail Merge Sent',
            delaySeconds: 20,
            mode: 'New',
            caps: { send: 50, draft: 110 },
            outputDir: '/tmp/out',
            markerPath: '/tmp/done.json',
        });
    });

    it('clamps the delay into the allowed window', () => {
        expect(parseConfig({ ...paths, delaySeconds: 5 }).delaySeconds).toBe(20);
        expect(parseConfig({ ...paths, delaySeconds: 300 }).delaySeconds).toBe(75);
        expect(parseConfig({ ...paths, delaySeconds: 45 }).delaySeconds).toBe(45);
    });

    it('rejects invalid values', () => {
        expect(() => parseConfig({ ...paths, mode: 'Broadcast' })).toThrow(ConfigError);
        expect(() => parseConfig({ ...paths, caps: { send: 0 } })).toThrow(ConfigError);
    });
});

describe('loadConfig', () => {
    it('reads and validates a JSON file', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mail-merge-config-'));
        const file = path.join(dir, 'app.config.json');
        fs.writeFileSync(file, JSON.stringify({ ...paths, labelName: 'Spring Outreach', mode: 'Draft' }));

        try {
            const config = loadConfig(file);
            expect(config.labelName).toBe('Spring Outreach');
            expect(config.mode).toBe('Draft');
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    it('fails for an explicit path that does not exist', () => {
        expect(() => loadConfig(path.join(os.tmpdir(), 'no-such-mail-merge.json'))).toThrow(ConfigError);
    });
});

describe('send mode and caps', () => {
    it('parses CLI mode names', () => {
        expect(parseSendMode('new')).toBe('New');
        expect(parseSendMode('Follow-Up')).toBe('Follow-up');
        expect(parseSendMode('draft')).toBe('Draft');
        expect(() => parseSendMode('blast')).toThrow(ConfigError);
    });

    it('uses the draft cap only for drafts', () => {
        const config = parseConfig(paths);
        expect(capForMode(config, 'Draft')).toBe(110);
        expect(capForMode(config, 'New')).toBe(50);
        expect(capForMode(config, 'Follow-up')).toBe(50);
    });

    it('clamps arbitrary delays', () => {
        expect(clampDelaySeconds(0.5)).toBe(20);
        expect(clampDelaySeconds(60)).toBe(60);
    });
});

describe('parseCount', () => {
    it('accepts whole numbers of at least 1', () => {
        expect(parseCount('1', 'Limit')).toBe(1);
        expect(parseCount('25', 'Limit')).toBe(25);
    });

    it('rejects fractions, zero and non-numbers', () => {
        expect(() => parseCount('0.5', 'Limit')).toThrow(ConfigError);
        expect(() => parseCount('0.5', 'Limit')).toThrow("Limit must be a whole number of at least 1, got '0.5'");
        expect(() => parseCount('0', 'Limit')).toThrow(ConfigError);
        expect(() => parseCount('-3', 'Limit')).toThrow(ConfigError);
        expect(() => parseCount('ten', 'Limit')).toThrow(ConfigError);
    });
});

describe('getGmailCredentials', () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it('reads credentials from the environment', () => {
        vi.stubEnv('GMAIL_CLIENT_ID', 'test-client');
        vi.stubEnv('GMAIL_CLIENT_SECRET', 'test-secret');
        vi.stubEnv('GMAIL_REFRESH_TOKEN', 'test-refresh-token');
        vi.stubEnv('GMAIL_REDIRECT_URI', 'http://localhost:3000/callback');

        expect(getGmailCredentials()).toEqual({
            clientId: 'test-client',
            clientSecret: 'test-secret',
            refreshToken: 'test-refresh-token',
            redirectUri: 'http://localhost:3000/callback',
        });
    });

    it('names the missing variables', () => {
        vi.stubEnv('GMAIL_CLIENT_ID', 'test-client');
        vi.stubEnv('GMAIL_CLIENT_SECRET', '');
        vi.stubEnv('GMAIL_REFRESH_TOKEN', '');

        expect(() => getGmailCredentials()).toThrow(
            'GMAIL_CLIENT_SECRET, GMAIL_REFRESH_TOKEN not found in environment variables. Please check your .env file.',
        );
    });
});
