// Recipient status as stored in the Status column
export type RecipientStatus = 'Pending' | 'Sent' | 'Draft' | 'Skipped' | 'Error';

export const RECIPIENT_STATUSES: readonly RecipientStatus[] = ['Pending', 'Sent', 'Draft', 'Skipped', 'Error'];

// Managed columns appended to every recipient table
export const EMAIL_COLUMN = 'Email';
export const THREAD_ID_COLUMN = 'ThreadId';
export const RFC_MESSAGE_ID_COLUMN = 'RfcMessageId';
export const STATUS_COLUMN = 'Status';
export const MANAGED_COLUMNS = [THREAD_ID_COLUMN, RFC_MESSAGE_ID_COLUMN, STATUS_COLUMN] as const;

// One row of the recipient table, keyed by column name
export type RecipientRecord = Record<string, string>;

export type SendMode = 'New' | 'Follow-up' | 'Draft';

export interface MergeTemplate {
    subject: string;
    body: string;
}

// Per-run caps on messages sent or drafted
export interface BatchCaps {
    send: number;
    draft: number;
}

// Application configuration
export interface AppConfig {
    subjectTemplate: string;
    bodyTemplate: string;
    labelName: string;
    delaySeconds: number;
    mode: SendMode;
    caps: BatchCaps;
    outputDir: string;
    markerPath: string;
    databasePath: string;
}

export interface GmailCredentials {
    clientId: string;
    clientSecret: string;
    refreshToken: string;
    redirectUri?: string;
}

// Gmail message as returned by send
export interface SentMessage {
    id: string;
    threadId: string;
}

export interface MailLabel {
    id: string;
    name: string;
}

export type RunPhase = 'Idle' | 'Running' | 'Completed';

export interface RecordError {
    address: string;
    message: string;
}

export interface RunTally {
    sent: number;
    drafted: number;
    skipped: string[];
    errors: RecordError[];
}

// Explicit state of one batch run
export interface RunState {
    phase: RunPhase;
    pendingIndices: number[];
    template: MergeTemplate;
    mode: SendMode;
    labelName: string;
    delayMs: number;
    cap: number;
    tally: RunTally;
    // Gmail ids of messages sent in this run, for labeling
    sentMessageIds: string[];
    processed: number;
    capReached: boolean;
    startedAt: Date;
    completedAt?: Date;
}

// Outcome of one processed recipient
export interface RecordOutcome {
    index: number;
    address: string;
    status: RecipientStatus;
    threadId?: string;
    rfcMessageId?: string;
    errorMessage?: string;
}

export interface CompletionMarker {
    completedAt: string;
    outputFilePath: string;
}

// End-of-run summary
export interface RunSummary {
    runId?: number;
    mode: SendMode;
    labelName: string;
    processed: number;
    sent: number;
    drafted: number;
    skipped: string[];
    errors: RecordError[];
    remaining: number;
    capReached: boolean;
    warnings: string[];
    outputFilePath: string;
    startedAt: Date;
    completedAt: Date;
}

// Row of the run history
export interface RunHistoryEntry {
    id: number;
    startedAt: string;
    completedAt: string;
    mode: SendMode;
    labelName: string;
    inputFile: string;
    outputFile: string;
    sent: number;
    drafted: number;
    skipped: number;
    errors: number;
}

export interface RunFailure {
    email: string;
    status: RecipientStatus;
    error: string | null;
}
