#!/usr/bin/env node

import * as fs from 'fs';
import { Command, Option } from 'commander';
import { initDatabase, closeDatabase, recordRun, getRunHistory, getRunFailures } from './db/database';
import {
    loadConfig,
    getGmailCredentials,
    getLogDir,
    parseSendMode,
    parseCount,
    capForMode,
    clampDelaySeconds,
} from './config';
import { ConfigError } from './errors';
import { AppConfig, MergeTemplate } from './types';
import { BatchRunner, createRunState } from './services/batch-runner';
import { GmailClient } from './services/gmail-client';
import { logger } from './services/logger';
import { JitteredIntervalLimiter } from './services/rate-limiter';
import { loadRecipientTable } from './services/recipient-table';
import { RecoveryStore, resolvePreviousRun } from './services/recovery-store';
import { ReportGenerator } from './services/report-generator';
import { RunFinalizer } from './services/run-finalizer';
import { markdownToHtml, renderWithFallback } from './services/template-renderer';

interface TemplateOptions {
    config?: string;
    subject?: string;
    bodyFile?: string;
}

interface SendOptions extends TemplateOptions {
    input: string;
    mode?: string;
    label?: string;
    delay?: string;
    limit?: string;
    reset?: boolean;
}

interface PreviewOptions extends TemplateOptions {
    input: string;
}

const program = new Command();

program
    .name('mail-merge')
    .description('Gmail mail merge CLI with resumable batches, drafts and threaded follow-ups')
    .version('1.0.0');

function resolveTemplate(config: AppConfig, options: TemplateOptions): MergeTemplate {
    let body = config.bodyTemplate;
    if (options.bodyFile) {
        if (!fs.existsSync(options.bodyFile)) {
            throw new ConfigError(`Body template file not found: ${options.bodyFile}`);
        }
        body = fs.readFileSync(options.bodyFile, 'utf-8');
    }
    return { subject: options.subject ?? config.subjectTemplate, body };
}

function parsePositive(value: string, name: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new ConfigError(`${name} must be a positive number, got '${value}'`);
    }
    return parsed;
}

function fail(error: unknown) {
    logger.error('Fatal execution error:', error);
    process.exitCode = 1;
}

// Preview command
program
    .command('preview')
    .description('Render the subject and body for the first recipient')
    .requiredOption('-i, --input <path>', 'Recipient list (.csv, .xlsx or .xls)')
    .option('-c, --config <path>', 'Path to app config JSON')
    .option('-s, --subject <template>', 'Subject template, e.g. "Hello {Name}"')
    .option('-b, --body-file <path>', 'Body template file (markdown subset, {Field} placeholders)')
    .action((options: PreviewOptions) => {
        try {
            const config = loadConfig(options.config);
            const template = resolveTemplate(config, options);
            const table = loadRecipientTable(options.input);

            if (table.length === 0) {
                logger.warn('Recipient list has no rows to preview');
                return;
            }

            const record = table.record(0);
            const subject = renderWithFallback(template.subject, record);
            const body = renderWithFallback(template.body, record);
            for (const warning of [subject.warning, body.warning]) {
                if (warning) {
                    logger.warn(warning);
                }
            }

            logger.info('--- Preview (first row) ---');
            logger.info(`Subject: ${subject.text}`);
            logger.info(`Body:\n${markdownToHtml(body.text)}`);
            logger.info('--- End Preview ---');
        } catch (error) {
            fail(error);
        } finally {
            logger.close();
        }
    });

// Send command
program
    .command('send')
    .description('Send, reply to, or draft one batch of merged emails')
    .requiredOption('-i, --input <path>', 'Recipient list (.csv, .xlsx or .xls)')
    .option('-c, --config <path>', 'Path to app config JSON')
    .addOption(new Option('-m, --mode <mode>', 'Send mode').choices(['new', 'follow-up', 'draft']))
    .option('-s, --subject <template>', 'Subject template, e.g. "Hello {Name}"')
    .option('-b, --body-file <path>', 'Body template file (markdown subset, {Field} placeholders)')
    .option('-l, --label <name>', 'Gmail label applied to sent messages')
    .option('-d, --delay <seconds>', 'Delay between emails in seconds (20-75)')
    .option('--limit <count>', 'Maximum emails sent or drafted in this run')
    .option('--reset', 'Clear the completion marker of the previous run first')
    .action(async (options: SendOptions) => {
        try {
            logger.init(getLogDir());
            logger.info(`Arguments: input=${options.input}, mode=${options.mode ?? '(config)'}, delay=${options.delay ?? '(config)'}`);

            const config = loadConfig(options.config);
            logger.info('Configuration loaded');

            const recovery = new RecoveryStore(config.markerPath);
            const reportGenerator = new ReportGenerator();

            const previous = resolvePreviousRun(recovery, options.reset ?? false);
            if (previous) {
                for (const line of reportGenerator.formatMarker(previous)) {
                    logger.info(line);
                }
                logger.info('Run `mail-merge reset` or pass --reset to start a new run.');
                return;
            }

            const template = resolveTemplate(config, options);
            const mode = options.mode ? parseSendMode(options.mode) : config.mode;
            const delaySeconds = options.delay ? clampDelaySeconds(parsePositive(options.delay, 'Delay')) : config.delaySeconds;
            const cap = options.limit ? parseCount(options.limit, 'Limit') : capForMode(config, mode);
            const labelName = options.label ?? config.labelName;

            const table = loadRecipientTable(options.input);
            const provider = GmailClient.fromCredentials(getGmailCredentials());
            initDatabase(config.databasePath);

            const state = createRunState(table, { template, mode, labelName, delayMs: delaySeconds * 1000, cap });
            const runner = new BatchRunner({
                provider,
                limiter: new JitteredIntervalLimiter({ intervalMs: state.delayMs }),
            });
            const finalizer = new RunFinalizer({ provider, recovery, outputDir: config.outputDir });

            const outcomes = await runner.run(table, state);
            const summary = await finalizer.finalize(table, state);
            summary.runId = recordRun(summary, options.input, outcomes);

            reportGenerator.displaySummary(summary);
        } catch (error) {
            fail(error);
        } finally {
            closeDatabase();
            logger.close();
        }
    });

// Status command
program
    .command('status')
    .description('Show the result of the last completed run')
    .option('-c, --config <path>', 'Path to app config JSON')
    .action((options: { config?: string }) => {
        try {
            const config = loadConfig(options.config);
            const marker = new RecoveryStore(config.markerPath).findCompletedRun();
            if (!marker) {
                logger.info('No completed run on record. Ready for a new run.');
                return;
            }
            for (const line of new ReportGenerator().formatMarker(marker)) {
                logger.info(line);
            }
        } catch (error) {
            fail(error);
        }
    });

// Reset command
program
    .command('reset')
    .description('Forget the last completed run so a new one can start')
    .option('-c, --config <path>', 'Path to app config JSON')
    .action((options: { config?: string }) => {
        try {
            const config = loadConfig(options.config);
            const removed = new RecoveryStore(config.markerPath).clear();
            logger.info(removed ? 'Reset complete. Ready for a new run.' : 'Nothing to reset.');
        } catch (error) {
            fail(error);
        }
    });

// History command
program
    .command('history')
    .description('List recent mail merge runs')
    .option('-c, --config <path>', 'Path to app config JSON')
    .option('-n, --limit <count>', 'Number of runs to show', '20')
    .option('-r, --run <id>', 'List the skipped and failed recipients of one run')
    .action((options: { config?: string; limit: string; run?: string }) => {
        try {
            const config = loadConfig(options.config);
            initDatabase(config.databasePath);
            const reportGenerator = new ReportGenerator();
            if (options.run) {
                const runId = parseCount(options.run, 'Run id');
                for (const line of reportGenerator.formatFailures(runId, getRunFailures(runId))) {
                    logger.info(line);
                }
                return;
            }
            reportGenerator.displayHistory(getRunHistory(parseCount(options.limit, 'Limit')));
        } catch (error) {
            fail(error);
        } finally {
            closeDatabase();
        }
    });

program.parseAsync().catch(fail);
