import { NoAddressFoundError, describeError } from '../errors';
import {
    EMAIL_COLUMN,
    MergeTemplate,
    RFC_MESSAGE_ID_COLUMN,
    RecordOutcome,
    RunState,
    SendMode,
    THREAD_ID_COLUMN,
} from '../types';
import { extractAddress } from './address-extractor';
import { logger } from './logger';
import { MailProvider } from './mail-provider';
import { buildRawMessage } from './message-builder';
import { RateLimiter } from './rate-limiter';
import { RecipientTable } from './recipient-table';
import { SleepFn, retryWithJitter } from './retry';
import { renderBodyHtml, renderTemplate } from './template-renderer';

export const MESSAGE_ID_HEADER = 'Message-ID';
export const MESSAGE_ID_POLL_ATTEMPTS = 6;

export interface RunOptions {
    template: MergeTemplate;
    mode: SendMode;
    labelName: string;
    delayMs: number;
    cap: number;
}

export interface BatchRunnerDeps {
    provider: MailProvider;
    limiter: RateLimiter;
    // Waits inside the Message-ID poll
    pollSleep?: SleepFn;
    random?: () => number;
}

interface ThreadLink {
    threadId: string;
    rfcMessageId: string;
}

export function createRunState(table: RecipientTable, options: RunOptions, startedAt: Date = new Date()): RunState {
    return {
        phase: 'Idle',
        pendingIndices: table.pendingIndices(),
        template: options.template,
        mode: options.mode,
        labelName: options.labelName,
        delayMs: options.delayMs,
        cap: options.cap,
        tally: { sent: 0, drafted: 0, skipped: [], errors: [] },
        sentMessageIds: [],
        processed: 0,
        capReached: false,
        startedAt,
    };
}

/**
 * Walks the pending rows of a recipient table in order, one provider call at
 * a time, and records each row's outcome in its Status column.
 */
export class BatchRunner {
    constructor(private readonly deps: BatchRunnerDeps) {}

    async run(table: RecipientTable, state: RunState): Promise<RecordOutcome[]> {
        if (state.phase !== 'Idle') {
            throw new Error(`Cannot start a run in phase ${state.phase}`);
        }
        state.phase = 'Running';

        const total = state.pendingIndices.length;
        const outcomes: RecordOutcome[] = [];
        logger.info(`Starting mail merge: ${total} pending, mode ${state.mode}, cap ${state.cap}`);

        for (let i = 0; i < total; i++) {
            if (state.tally.sent + state.tally.drafted >= state.cap) {
                state.capReached = true;
                logger.warn(`Batch cap of ${state.cap} reached; ${total - i} recipients left for a later run`);
                break;
            }

            const index = state.pendingIndices[i];
            logger.info(`[${i + 1}/${total}] Processing row ${index + 1}`);
            outcomes.push(await this.processRecord(table, index, state));
            state.processed += 1;
        }

        return outcomes;
    }

    private async processRecord(table: RecipientTable, index: number, state: RunState): Promise<RecordOutcome> {
        const rawAddress = table.get(index, EMAIL_COLUMN).trim();
        const address = extractAddress(rawAddress);

        if (!address) {
            const reason = new NoAddressFoundError(rawAddress);
            logger.warn(`Skipping row ${index + 1}: ${reason.message}`);
            table.setStatus(index, 'Skipped');
            state.tally.skipped.push(rawAddress);
            return { index, address: rawAddress, status: 'Skipped', errorMessage: reason.message };
        }

        try {
            const record = table.record(index);
            const subject = renderTemplate(state.template.subject, record);
            const html = renderBodyHtml(renderTemplate(state.template.body, record));
            const thread = state.mode === 'Follow-up' ? this.threadLink(table, index, address) : undefined;

            const raw = await buildRawMessage({ to: address, subject, html, inReplyTo: thread?.rfcMessageId });

            await this.deps.limiter.acquire();

            if (state.mode === 'Draft') {
                await this.deps.provider.createDraft(raw);
                table.setStatus(index, 'Draft');
                state.tally.drafted += 1;
                logger.info(`✓ Draft saved for ${address}`);
                return { index, address, status: 'Draft' };
            }

            const sent = await this.deps.provider.sendMessage(raw, thread?.threadId);
            const rfcMessageId = (await this.fetchRfcMessageId(sent.id)) ?? sent.id;

            table.set(index, THREAD_ID_COLUMN, sent.threadId);
            table.set(index, RFC_MESSAGE_ID_COLUMN, rfcMessageId);
            table.setStatus(index, 'Sent');
            state.tally.sent += 1;
            state.sentMessageIds.push(sent.id);
            logger.info(`✓ Email sent to ${address}${thread ? ' (threaded reply)' : ''}`);

            return { index, address, status: 'Sent', threadId: sent.threadId, rfcMessageId };
        } catch (error) {
            const message = describeError(error);
            table.setStatus(index, 'Error');
            state.tally.errors.push({ address, message });
            logger.error(`✗ Error for ${address}: ${message}`);
            return { index, address, status: 'Error', errorMessage: message };
        }
    }

    // Thread data for a follow-up; missing data means an unthreaded send
    private threadLink(table: RecipientTable, index: number, address: string): ThreadLink | undefined {
        const threadId = table.get(index, THREAD_ID_COLUMN).trim();
        const rfcMessageId = table.get(index, RFC_MESSAGE_ID_COLUMN).trim();

        if (threadId && rfcMessageId) {
            return { threadId, rfcMessageId };
        }

        logger.warn(`No ThreadId/RfcMessageId for ${address}; sending as a new message`);
        return undefined;
    }

    private async fetchRfcMessageId(messageId: string): Promise<string | null> {
        const outcome = await retryWithJitter(() => this.deps.provider.getMessageHeader(messageId, MESSAGE_ID_HEADER), {
            attempts: MESSAGE_ID_POLL_ATTEMPTS,
            minDelayMs: 1000,
            maxDelayMs: 2000,
            description: `Message-ID lookup for ${messageId}`,
            sleep: this.deps.pollSleep,
            random: this.deps.random,
        });

        if (outcome.value === null) {
            logger.warn(`Message-ID header not available for ${messageId}; storing Gmail id instead`);
        }
        return outcome.value;
    }
}
