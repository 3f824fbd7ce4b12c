import { google, gmail_v1 } from 'googleapis';
import { ProviderCallError } from '../errors';
import { GmailCredentials, MailLabel, SentMessage } from '../types';
import { MailProvider } from './mail-provider';
import { logger } from './logger';

export const GMAIL_SCOPES = [
    'https://www.googleapis.com/auth/gmail.send',
    'https://www.googleapis.com/auth/gmail.modify',
    'https://www.googleapis.com/auth/gmail.labels',
    'https://www.googleapis.com/auth/gmail.compose',
];

const USER_ID = 'me';

export class GmailClient implements MailProvider {
    constructor(private readonly gmail: gmail_v1.Gmail) {}

    static fromCredentials(credentials: GmailCredentials): GmailClient {
        const auth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret, credentials.redirectUri);
        auth.setCredentials({ refresh_token: credentials.refreshToken, scope: GMAIL_SCOPES.join(' ') });
        return new GmailClient(google.gmail({ version: 'v1', auth }));
    }

    async listLabels(): Promise<MailLabel[]> {
        const response = await this.call('labels.list', () => this.gmail.users.labels.list({ userId: USER_ID }));
        const labels: MailLabel[] = [];
        for (const label of response.data.labels ?? []) {
            if (label.id && label.name) {
                labels.push({ id: label.id, name: label.name });
            }
        }
        return labels;
    }

    async createLabel(name: string): Promise<MailLabel> {
        const response = await this.call('labels.create', () =>
            this.gmail.users.labels.create({
                userId: USER_ID,
                requestBody: { name, labelListVisibility: 'labelShow', messageListVisibility: 'show' },
            }),
        );
        const id = response.data.id;
        if (!id) {
            throw new ProviderCallError('labels.create', new Error('response carried no label id'));
        }
        return { id, name: response.data.name ?? name };
    }

    async sendMessage(raw: string, threadId?: string): Promise<SentMessage> {
        const response = await this.call('messages.send', () =>
            this.gmail.users.messages.send({
                userId: USER_ID,
                requestBody: threadId ? { raw, threadId } : { raw },
            }),
        );
        const id = response.data.id;
        if (!id) {
            throw new ProviderCallError('messages.send', new Error('response carried no message id'));
        }
        return { id, threadId: response.data.threadId ?? '' };
    }

    async createDraft(raw: string, threadId?: string): Promise<{ id: string }> {
        const response = await this.call('drafts.create', () =>
            this.gmail.users.drafts.create({
                userId: USER_ID,
                requestBody: { message: threadId ? { raw, threadId } : { raw } },
            }),
        );
        return { id: response.data.id ?? '' };
    }

    async getMessageHeader(messageId: string, headerName: string): Promise<string | null> {
        const response = await this.call('messages.get', () =>
            this.gmail.users.messages.get({
                userId: USER_ID,
                id: messageId,
                format: 'metadata',
                metadataHeaders: [headerName],
            }),
        );
        const wanted = headerName.toLowerCase();
        const header = (response.data.payload?.headers ?? []).find(h => (h.name ?? '').toLowerCase() === wanted);
        return header?.value || null;
    }

    async addLabelToMessages(messageIds: string[], labelId: string): Promise<void> {
        await this.call('messages.batchModify', () =>
            this.gmail.users.messages.batchModify({
                userId: USER_ID,
                requestBody: { ids: messageIds, addLabelIds: [labelId] },
            }),
        );
    }

    async getProfileAddress(): Promise<string> {
        const response = await this.call('getProfile', () => this.gmail.users.getProfile({ userId: USER_ID }));
        const address = response.data.emailAddress;
        if (!address) {
            throw new ProviderCallError('getProfile', new Error('profile carried no email address'));
        }
        return address;
    }

    private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
        try {
            return await request();
        } catch (error) {
            logger.debug(`Gmail ${operation} failed`, error);
            throw new ProviderCallError(operation, error);
        }
    }
}
