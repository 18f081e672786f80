/**
 * Conversation Messages
 *
 * Role-tagged text entries threaded through a run, plus helpers for
 * reading the message shapes callers and LangChain hand us.
 */

import { isBaseMessage, isHumanMessage, type BaseMessage } from '@langchain/core/messages';
import { isRecord } from './shared/guards';

// ============================================================
// Types
// ============================================================

export type MessageRole = 'user' | 'worker' | 'system';

/**
 * A single entry in the run's conversation
 */
export interface ConversationMessage {
    id: string;
    role: MessageRole;
    content: string;
    /** Worker or step that produced the message */
    source?: string;
    /** Degraded-path note rather than real analysis output */
    diagnostic?: boolean;
    timestamp: string;
}

/**
 * Any message representation accepted when scanning history:
 * plain text (treated as user text, as LangChain does), a role-tagged
 * tuple, a role-tagged record, or a LangChain message.
 */
export type MessageLike =
    | string
    | readonly [string, string]
    | { role: string; content: unknown }
    | BaseMessage;

const USER_ROLES = new Set(['user', 'human']);

// ============================================================
// Construction
// ============================================================

let messageCounter = 0;

function nextMessageId(role: MessageRole): string {
    messageCounter += 1;
    return `msg_${role}_${Date.now()}_${messageCounter}`;
}

export function createMessage(
    role: MessageRole,
    content: string,
    options: { source?: string; diagnostic?: boolean } = {}
): ConversationMessage {
    return {
        id: nextMessageId(role),
        role,
        content,
        timestamp: new Date().toISOString(),
        ...(options.source !== undefined ? { source: options.source } : {}),
        ...(options.diagnostic ? { diagnostic: true } : {}),
    };
}

export const userMessage = (content: string): ConversationMessage =>
    createMessage('user', content);

export const workerMessage = (source: string, content: string): ConversationMessage =>
    createMessage('worker', content, { source });

export const systemNote = (
    content: string,
    options: { source?: string; diagnostic?: boolean } = {}
): ConversationMessage => createMessage('system', content, options);

// ============================================================
// Reading
// ============================================================

function isRoleTuple(value: unknown): value is readonly [string, string] {
    return (
        Array.isArray(value) &&
        value.length === 2 &&
        typeof value[0] === 'string' &&
        typeof value[1] === 'string'
    );
}

/**
 * Text parts of a message content, joined by newlines
 */
export function contentToText(content: unknown): string {
    if (typeof content === 'string') return content;
    if (Array.isArray(content)) {
        return content
            .map((part) => (isRecord(part) && typeof part.text === 'string' ? part.text : ''))
            .filter(Boolean)
            .join('\n');
    }
    return content === undefined || content === null ? '' : String(content);
}

/**
 * Text of a message if it was authored by the user, otherwise null
 */
export function userTextOf(message: MessageLike): string | null {
    if (typeof message === 'string') {
        return message;
    }
    if (isRoleTuple(message)) {
        const [role, text] = message;
        return USER_ROLES.has(role.toLowerCase()) ? text : null;
    }
    if (isBaseMessage(message)) {
        return isHumanMessage(message) ? contentToText(message.content) : null;
    }
    if (isRecord(message) && typeof message.role === 'string') {
        return USER_ROLES.has(message.role.toLowerCase()) ? contentToText(message.content) : null;
    }
    return null;
}

/**
 * Most recent user-authored text, scanning backward
 */
export function findLatestUserText(messages: readonly MessageLike[]): string | null {
    for (let i = messages.length - 1; i >= 0; i--) {
        const text = userTextOf(messages[i]);
        if (text !== null && text.trim().length > 0) {
            return text;
        }
    }
    return null;
}

/**
 * Render history as plain text for prompts and classifiers
 */
export function renderTranscript(messages: readonly ConversationMessage[]): string {
    return messages
        .map((m) => `[${m.source ? `${m.role}:${m.source}` : m.role}] ${m.content}`)
        .join('\n');
}
