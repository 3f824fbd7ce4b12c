import * as path from 'path';
import { BackupEmailFailure, LabelingFailure, describeError } from '../errors';
import { RunState, RunSummary } from '../types';
import { logger } from './logger';
import { MailProvider } from './mail-provider';
import { buildRawMessage } from './message-builder';
import { RecipientTable, saveRecipientTable } from './recipient-table';
import { RecoveryStore } from './recovery-store';
import { SleepFn, retryWithJitter } from './retry';

export const LABEL_ATTEMPTS = 3;

export interface RunFinalizerDeps {
    provider: MailProvider;
    recovery: RecoveryStore;
    outputDir: string;
    retrySleep?: SleepFn;
    random?: () => number;
    now?: () => Date;
}

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

// YYYYMMDD_HHMMSS in local time
export function fileTimestamp(date: Date): string {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `${day}_${time}`;
}

export function outputFileName(labelName: string, date: Date): string {
    const safeLabel = labelName.replace(/[^A-Za-z0-9_-]/g, '_');
    return `Updated_${safeLabel}_${fileTimestamp(date)}.csv`;
}

export function backupSubject(date: Date): string {
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    return `Mail Merge Backup CSV - ${day} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * Completes a run: labels what was sent, writes the updated table, mails it
 * back to the account as a backup and leaves the completion marker. Labeling,
 * backup and marker problems become warnings on the summary.
 */
export class RunFinalizer {
    private readonly now: () => Date;

    constructor(private readonly deps: RunFinalizerDeps) {
        this.now = deps.now ?? (() => new Date());
    }

    async finalize(table: RecipientTable, state: RunState): Promise<RunSummary> {
        const warnings: string[] = [];

        if (state.mode !== 'Draft' && state.sentMessageIds.length > 0) {
            try {
                await this.applyLabel(state.labelName, state.sentMessageIds);
            } catch (error) {
                warnings.push(describeError(error));
                logger.warn(`Labeling failed: ${describeError(error)}`);
            }
        }

        const completedAt = this.now();
        const outputFilePath = path.join(this.deps.outputDir, outputFileName(state.labelName, completedAt));
        saveRecipientTable(table, outputFilePath);
        logger.info(`Updated recipient list saved to ${outputFilePath}`);

        try {
            await this.sendBackup(outputFilePath, completedAt);
        } catch (error) {
            warnings.push(describeError(error));
            logger.warn(`Could not send backup email: ${describeError(error)}`);
        }

        try {
            this.deps.recovery.write({ completedAt: completedAt.toISOString(), outputFilePath });
        } catch (error) {
            warnings.push(`Could not write completion marker: ${describeError(error)}`);
            logger.warn(`Could not write completion marker`, error);
        }

        state.phase = 'Completed';
        state.completedAt = completedAt;

        return {
            mode: state.mode,
            labelName: state.labelName,
            processed: state.processed,
            sent: state.tally.sent,
            drafted: state.tally.drafted,
            skipped: [...state.tally.skipped],
            errors: [...state.tally.errors],
            remaining: table.countByStatus().Pending,
            capReached: state.capReached,
            warnings,
            outputFilePath,
            startedAt: state.startedAt,
            completedAt,
        };
    }

    async resolveLabelId(labelName: string): Promise<string> {
        const wanted = labelName.toLowerCase();
        const existing = (await this.deps.provider.listLabels()).find(label => label.name.toLowerCase() === wanted);
        if (existing) {
            return existing.id;
        }
        logger.info(`Creating Gmail label '${labelName}'`);
        return (await this.deps.provider.createLabel(labelName)).id;
    }

    async applyLabel(labelName: string, messageIds: string[]): Promise<void> {
        let labelId: string;
        try {
            labelId = await this.resolveLabelId(labelName);
        } catch (error) {
            throw new LabelingFailure(`Could not find or create label '${labelName}': ${describeError(error)}`, {
                cause: error,
            });
        }

        const outcome = await retryWithJitter(
            async () => {
                await this.deps.provider.addLabelToMessages(messageIds, labelId);
                return true;
            },
            {
                attempts: LABEL_ATTEMPTS,
                minDelayMs: 1000,
                maxDelayMs: 2000,
                description: `Applying label '${labelName}'`,
                sleep: this.deps.retrySleep,
                random: this.deps.random,
            },
        );

        if (outcome.value === null) {
            throw new LabelingFailure(
                `Could not apply label '${labelName}' to ${messageIds.length} messages: ${describeError(outcome.lastError)}`,
                { cause: outcome.lastError },
            );
        }
        logger.info(`Label '${labelName}' applied to ${messageIds.length} messages`);
    }

    async sendBackup(csvPath: string, date: Date): Promise<string> {
        try {
            const address = await this.deps.provider.getProfileAddress();
            const raw = await buildRawMessage({
                to: address,
                from: address,
                subject: backupSubject(date),
                text: 'Attached is the backup CSV for your mail merge run.',
                attachments: [{ filename: path.basename(csvPath), path: csvPath, contentType: 'text/csv' }],
            });
            await this.deps.provider.sendMessage(raw);
            logger.info(`Backup CSV emailed to ${address}`);
            return address;
        } catch (error) {
            throw new BackupEmailFailure(`Backup email failed: ${describeError(error)}`, { cause: error });
        }
    }
}
