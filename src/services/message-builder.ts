import MailComposer from 'nodemailer/lib/mail-composer';
import Mail from 'nodemailer/lib/mailer';

export interface OutgoingMessage {
    to: string;
    from?: string;
    subject: string;
    html?: string;
    text?: string;
    // RFC Message-ID of the message being replied to
    inReplyTo?: string;
    attachments?: { filename: string; path: string; contentType?: string }[];
}

export function toMailOptions(message: OutgoingMessage): Mail.Options {
    const options: Mail.Options = {
        to: message.to,
        subject: message.subject,
    };

    if (message.from) {
        options.from = message.from;
    }
    if (message.html !== undefined) {
        options.html = message.html;
    }
    if (message.text !== undefined) {
        options.text = message.text;
    }
    if (message.inReplyTo) {
        options.inReplyTo = message.inReplyTo;
        options.references = message.inReplyTo;
    }
    if (message.attachments && message.attachments.length > 0) {
        options.attachments = message.attachments;
    }

    return options;
}

/**
 * Compose the RFC 822 message and encode it the way the Gmail API expects
 * in `raw` (base64url, no padding).
 */
export function buildRawMessage(message: OutgoingMessage): Promise<string> {
    const mime = new MailComposer(toMailOptions(message)).compile();

    return new Promise((resolve, reject) => {
        mime.build((error, buffer) => {
            if (error) {
                reject(error);
                return;
            }
            resolve(buffer.toString('base64url'));
        });
    });
}

export function decodeRawMessage(raw: string): string {
    return Buffer.from(raw, 'base64url').toString('utf-8');
}
