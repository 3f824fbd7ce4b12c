import { beforeEach, describe, it, expect, vi, type Mock } from 'vitest';
import { BatchRunner, RunOptions, createRunState } from '../../src/services/batch-runner';
import { RateLimiter } from '../../src/services/rate-limiter';
import { parseCsvContent } from '../../src/services/recipient-table';
import { FakeMailProvider } from '../helpers/fake-mail-provider';

const template = { subject: 'Hello {Name}', body: 'Dear {Name},\n\n**Welcome**' };

function options(overrides: Partial<RunOptions> = {}): RunOptions {
    return { template, mode: 'New', labelName: 'Mail Merge Sent', delayMs: 20000, cap: 50, ...overrides };
}

describe('BatchRunner', () => {
    let provider: FakeMailProvider;
    let acquire: Mock<() => Promise<void>>;
    let limiter: RateLimiter;
    let pollWaits: number[];
    let runner: BatchRunner;

    beforeEach(() => {
        provider = new FakeMailProvider();
        acquire = vi.fn(async () => {});
        limiter = { acquire };
        pollWaits = [];
        runner = new BatchRunner({
            provider,
            limiter,
            pollSleep: async ms => {
                pollWaits.push(ms);
            },
            random: () => 0,
        });
    });

    it('sends every pending record and stores thread data', async () => {
        const table = parseCsvContent('Email,Name\nann@example.com,Ann\nJane Doe <jane.doe@example.co.uk>,Jane\n');
        const state = createRunState(table, options());

        const outcomes = await runner.run(table, state);

        expect(outcomes.map(o => o.status)).toEqual(['Sent', 'Sent']);
        expect(provider.sent.map(m => m.to)).toEqual(['ann@example.com', 'jane.doe@example.co.uk']);
        expect(table.record(0)).toMatchObject({ ThreadId: 'thread-1', RfcMessageId: '<msg-1@mail.test>', Status: 'Sent' });
        expect(table.record(1)).toMatchObject({ ThreadId: 'thread-2', RfcMessageId: '<msg-2@mail.test>', Status: 'Sent' });
        expect(state.tally).toEqual({ sent: 2, drafted: 0, skipped: [], errors: [] });
        expect(state.sentMessageIds).toEqual(['msg-1', 'msg-2']);
        expect(state.phase).toBe('Running');
        expect(acquire).toHaveBeenCalledTimes(2);
    });

    it('sends to the whole address when the local part is not ASCII', async () => {
        const table = parseCsvContent('Email,Name\nJürgen <jürgen@example.de>,Jürgen\n');
        const state = createRunState(table, options());

        const outcomes = await runner.run(table, state);

        expect(outcomes[0]).toMatchObject({ address: 'jürgen@example.de', status: 'Sent' });
        expect(provider.sent.map(m => m.to)).toEqual(['jürgen@example.de']);
    });

    it('renders the subject per recipient', async () => {
        const table = parseCsvContent('Email,Name\nann@example.com,Ann\n');
        await runner.run(table, createRunState(table, options()));

        expect(provider.sent[0].mime).toContain('Subject: Hello Ann');
    });

    it('stops at the per-run cap and leaves the rest pending', async () => {
        const table = parseCsvContent('Email,Name\na@example.com,A\nb@example.com,B\nc@example.com,C\n');
        const state = createRunState(table, options({ cap: 2 }));

        const outcomes = await runner.run(table, state);

        expect(outcomes).toHaveLength(2);
        expect(state.processed).toBe(2);
        expect(state.capReached).toBe(true);
        expect(table.getStatus(0)).toBe('Sent');
        expect(table.getStatus(1)).toBe('Sent');
        expect(table.getStatus(2)).toBe('Pending');
        expect(table.pendingIndices()).toEqual([2]);
    });

    it('skips records without an address and makes no provider call', async () => {
        const table = parseCsvContent('Email,Name\nnot an email,Nobody\nann@example.com,Ann\n');
        const state = createRunState(table, options());

        const outcomes = await runner.run(table, state);

        expect(outcomes[0]).toEqual({
            index: 0,
            address: 'not an email',
            status: 'Skipped',
            errorMessage: "No email address found in 'not an email'",
        });
        expect(table.getStatus(0)).toBe('Skipped');
        expect(state.tally.skipped).toEqual(['not an email']);
        expect(provider.sent).toHaveLength(1);
        expect(acquire).toHaveBeenCalledTimes(1);
    });

    it('marks records Error when a template field is missing and keeps going', async () => {
        const table = parseCsvContent('Email,Name\nann@example.com,Ann\nbob@example.com,Bob\n');
        const state = createRunState(table, options({ template: { subject: 'Hi {Nickname}', body: 'Body' } }));

        const outcomes = await runner.run(table, state);

        expect(outcomes.map(o => o.status)).toEqual(['Error', 'Error']);
        expect(state.tally.errors).toEqual([
            { address: 'ann@example.com', message: "Missing field 'Nickname' in recipient record" },
            { address: 'bob@example.com', message: "Missing field 'Nickname' in recipient record" },
        ]);
        expect(provider.sent).toHaveLength(0);
    });

    it('isolates provider failures per record', async () => {
        provider.failingRecipients.add('bad@example.com');
        const table = parseCsvContent('Email,Name\nbad@example.com,Bad\ngood@example.com,Good\n');
        const state = createRunState(table, options());

        await runner.run(table, state);

        expect(table.getStatus(0)).toBe('Error');
        expect(table.getStatus(1)).toBe('Sent');
        expect(state.tally.errors).toEqual([
            { address: 'bad@example.com', message: 'messages.send failed: Invalid To header: bad@example.com' },
        ]);
        expect(state.tally.sent).toBe(1);
    });

    it('threads a follow-up onto the previous message', async () => {
        const table = parseCsvContent(
            'Email,Name,ThreadId,RfcMessageId,Status\nann@example.com,Ann,thread-77,<orig-1@mail.test>,\n',
        );
        const state = createRunState(table, options({ mode: 'Follow-up' }));

        await runner.run(table, state);

        expect(provider.sent[0].threadId).toBe('thread-77');
        expect(provider.sent[0].mime).toContain('In-Reply-To: <orig-1@mail.test>');
        expect(provider.sent[0].mime).toContain('References: <orig-1@mail.test>');
        expect(table.get(0, 'ThreadId')).toBe('thread-77');
        expect(table.getStatus(0)).toBe('Sent');
    });

    it('sends a follow-up without thread data as a new message', async () => {
        const table = parseCsvContent('Email,Name,ThreadId,RfcMessageId\nann@example.com,Ann,,<orig-1@mail.test>\n');
        const state = createRunState(table, options({ mode: 'Follow-up' }));

        const outcomes = await runner.run(table, state);

        expect(outcomes[0].status).toBe('Sent');
        expect(provider.sent[0].threadId).toBeUndefined();
        expect(provider.sent[0].mime).not.toContain('In-Reply-To:');
        expect(table.get(0, 'ThreadId')).toBe('thread-1');
    });

    it('saves drafts without polling for headers', async () => {
        const table = parseCsvContent('Email,Name\nann@example.com,Ann\nbob@example.com,Bob\n');
        const state = createRunState(table, options({ mode: 'Draft', cap: 110 }));

        await runner.run(table, state);

        expect(provider.drafts.map(d => d.to)).toEqual(['ann@example.com', 'bob@example.com']);
        expect(provider.sent).toHaveLength(0);
        expect(provider.headerCalls).toBe(0);
        expect(table.getStatus(0)).toBe('Draft');
        expect(state.tally.drafted).toBe(2);
        expect(state.sentMessageIds).toEqual([]);
    });

    it('falls back to the Gmail id when the Message-ID never appears', async () => {
        provider.headerNeverAvailable = true;
        const table = parseCsvContent('Email,Name\nann@example.com,Ann\n');

        await runner.run(table, createRunState(table, options()));

        expect(provider.headerCalls).toBe(6);
        expect(pollWaits).toEqual([1000, 1000, 1000, 1000, 1000]);
        expect(table.get(0, 'RfcMessageId')).toBe('msg-1');
        expect(table.getStatus(0)).toBe('Sent');
    });

    it('picks up a Message-ID that appears after a few polls', async () => {
        provider.headerMisses = 2;
        const table = parseCsvContent('Email,Name\nann@example.com,Ann\n');

        await runner.run(table, createRunState(table, options()));

        expect(provider.headerCalls).toBe(3);
        expect(table.get(0, 'RfcMessageId')).toBe('<msg-1@mail.test>');
    });

    it('processes nothing when every record is already terminal', async () => {
        const table = parseCsvContent('Email,Name,Status\nann@example.com,Ann,Sent\nbob@example.com,Bob,Draft\n');
        const state = createRunState(table, options());

        const outcomes = await runner.run(table, state);

        expect(outcomes).toEqual([]);
        expect(state.processed).toBe(0);
        expect(state.tally).toEqual({ sent: 0, drafted: 0, skipped: [], errors: [] });
        expect(provider.sent).toHaveLength(0);
    });

    it('refuses to run the same state twice', async () => {
        const table = parseCsvContent('Email,Name\nann@example.com,Ann\n');
        const state = createRunState(table, options());
        await runner.run(table, state);

        await expect(runner.run(table, state)).rejects.toThrow('Cannot start a run in phase Running');
    });
});
