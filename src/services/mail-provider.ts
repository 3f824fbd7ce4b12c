import { MailLabel, SentMessage } from '../types';

/**
 * Operations the merge needs from the mail provider. `raw` is a complete
 * base64url-encoded RFC 822 message.
 */
export interface MailProvider {
    listLabels(): Promise<MailLabel[]>;
    createLabel(name: string): Promise<MailLabel>;
    sendMessage(raw: string, threadId?: string): Promise<SentMessage>;
    createDraft(raw: string, threadId?: string): Promise<{ id: string }>;
    // Value of a single header, or null when the message does not carry it
    getMessageHeader(messageId: string, headerName: string): Promise<string | null>;
    addLabelToMessages(messageIds: string[], labelId: string): Promise<void>;
    getProfileAddress(): Promise<string>;
}
