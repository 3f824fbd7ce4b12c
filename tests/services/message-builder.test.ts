import { describe, it, expect } from 'vitest';
import { buildRawMessage, decodeRawMessage, toMailOptions } from '../../src/services/message-builder';

describe('toMailOptions', () => {
    it('adds threading headers only for replies', () => {
        expect(toMailOptions({ to: 'ann@example.com', subject: 'Hi', html: '<b>Hi</b>' })).toEqual({
            to: 'ann@example.com',
            subject: 'Hi',
            html: '<b>Hi</b>',
        });

        expect(
            toMailOptions({ to: 'ann@example.com', subject: 'Hi', html: '<b>Hi</b>', inReplyTo: '<orig-1@mail.test>' }),
        ).toEqual({
            to: 'ann@example.com',
            subject: 'Hi',
            html: '<b>Hi</b>',
            inReplyTo: '<orig-1@mail.test>',
            references: '<orig-1@mail.test>',
        });
    });
});

describe('buildRawMessage', () => {
    it('encodes a base64url message with the merged headers', async () => {
        const raw = await buildRawMessage({ to: 'ann@example.com', subject: 'Hello Ann', html: '<b>Hi</b>' });

        expect(raw).toMatch(/^[A-Za-z0-9_-]+$/);
        const mime = decodeRawMessage(raw);
        expect(mime).toContain('To: ann@example.com');
        expect(mime).toContain('Subject: Hello Ann');
        expect(mime).toContain('Content-Type: text/html');
        expect(mime).not.toContain('In-Reply-To:');
    });

    it('carries In-Reply-To and References for follow-ups', async () => {
        const raw = await buildRawMessage({
            to: 'ann@example.com',
            subject: 'Following up',
            html: '<p>Any news?</p>',
            inReplyTo: '<orig-1@mail.test>',
        });

        const mime = decodeRawMessage(raw);
        expect(mime).toContain('In-Reply-To: <orig-1@mail.test>');
        expect(mime).toContain('References: <orig-1@mail.test>');
    });
});
