import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors';
import { AppConfig, GmailCredentials, SendMode } from '../types';

// Load environment variables
dotenv.config();

const DEFAULT_CONFIG_PATH = path.join(process.cwd(), 'config', 'app.config.json');

// Gmail abuse limits; delays outside this window are clamped
export const MIN_DELAY_SECONDS = 20;
export const MAX_DELAY_SECONDS = 75;

export const DEFAULT_SUBJECT_TEMPLATE = 'Hello {Name}';
export const DEFAULT_BODY_TEMPLATE = `Dear {Name},

Welcome to the **Mail Merge** demo.

Thanks,
**Your Company**`;

const sendModeSchema = z.enum(['New', 'Follow-up', 'Draft']);

const appConfigSchema = z.object({
    subjectTemplate: z.string().default(DEFAULT_SUBJECT_TEMPLATE),
    bodyTemplate: z.string().default(DEFAULT_BODY_TEMPLATE),
    labelName: z.string().min(1).default('Mail Merge Sent'),
    delaySeconds: z.number().positive().default(MIN_DELAY_SECONDS),
    mode: sendModeSchema.default('New'),
    caps: z
        .object({
            send: z.number().int().positive().default(50),
            draft: z.number().int().positive().default(110),
        })
        .default({}),
    outputDir: z.string().optional(),
    markerPath: z.string().optional(),
    databasePath: z.string().optional(),
});

export function getDataDir(): string {
    const dataDir = path.join(process.cwd(), 'data');
    if (!fs.existsSync(dataDir)) {
        fs.mkdirSync(dataDir, { recursive: true });
    }
    return dataDir;
}

export function getLogDir(): string {
    return path.join(process.cwd(), 'logs');
}

export function parseConfig(raw: unknown): AppConfig {
    const result = appConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
    }

    const parsed = result.data;
    return {
        ...parsed,
        delaySeconds: clampDelaySeconds(parsed.delaySeconds),
        outputDir: parsed.outputDir ?? path.join(getDataDir(), 'output'),
        markerPath: parsed.markerPath ?? process.env.MAIL_MERGE_MARKER_PATH ?? path.join(getDataDir(), 'mail-merge-done.json'),
        databasePath: parsed.databasePath ?? path.join(getDataDir(), 'mail-merge.db'),
    };
}

export function loadConfig(configPath?: string): AppConfig {
    const filePath = configPath || DEFAULT_CONFIG_PATH;

    if (!fs.existsSync(filePath)) {
        if (configPath) {
            throw new ConfigError(`Configuration file not found: ${filePath}`);
        }
        return parseConfig({});
    }

    const content = fs.readFileSync(filePath, 'utf-8');
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new ConfigError(`Configuration file is not valid JSON: ${filePath}`, { cause: error });
    }
    return parseConfig(raw);
}

export function clampDelaySeconds(seconds: number): number {
    return Math.min(MAX_DELAY_SECONDS, Math.max(MIN_DELAY_SECONDS, seconds));
}

// Whole number of at least 1, as the caps in the config file
export function parseCount(value: string, name: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new ConfigError(`${name} must be a whole number of at least 1, got '${value}'`);
    }
    return parsed;
}

export function parseSendMode(value: string): SendMode {
    switch (value.trim().toLowerCase()) {
        case 'new':
            return 'New';
        case 'follow-up':
        case 'followup':
        case 'reply':
            return 'Follow-up';
        case 'draft':
            return 'Draft';
        default:
            throw new ConfigError(`Unknown send mode '${value}' (expected new, follow-up or draft)`);
    }
}

export function capForMode(config: AppConfig, mode: SendMode): number {
    return mode === 'Draft' ? config.caps.draft : config.caps.send;
}

export function getGmailCredentials(): GmailCredentials {
    const clientId = process.env.GMAIL_CLIENT_ID;
    const clientSecret = process.env.GMAIL_CLIENT_SECRET;
    const refreshToken = process.env.GMAIL_REFRESH_TOKEN;

    const missing = [
        ['GMAIL_CLIENT_ID', clientId],
        ['GMAIL_CLIENT_SECRET', clientSecret],
        ['GMAIL_REFRESH_TOKEN', refreshToken],
    ]
        .filter(([, value]) => !value)
        .map(([name]) => name);

    if (!clientId || !clientSecret || !refreshToken) {
        throw new ConfigError(`${missing.join(', ')} not found in environment variables. Please check your .env file.`);
    }

    return {
        clientId,
        clientSecret,
        refreshToken,
        redirectUri: process.env.GMAIL_REDIRECT_URI,
    };
}
