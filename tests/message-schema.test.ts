/**
 * Message Model Tests
 * Constructors, guards, and reading messages back from untrusted records
 */

import { describe, it, expect } from '@jest/globals';
import {
  CorruptedStateError,
  UnknownMessageVariantError,
} from '../src/errors';
import {
  aiMessage,
  deserializeMessage,
  findOrphanToolMessages,
  hasToolCalls,
  humanMessage,
  isAIMessage,
  serializeMessage,
  systemMessage,
  toolMessage,
} from '../src/schema/message-schema';

describe('Message Model', () => {
  describe('Constructors', () => {
    it('should build each variant with its tag', () => {
      expect(systemMessage('be brief')).toEqual({ type: 'system', content: 'be brief' });
      expect(humanMessage('hi', { id: 'm1' })).toEqual({
        type: 'human',
        content: 'hi',
        id: 'm1',
      });
      expect(toolMessage('"ok"', 'call_1', { name: 'lookup' })).toEqual({
        type: 'tool',
        content: '"ok"',
        tool_call_id: 'call_1',
        name: 'lookup',
      });
    });

    it('should default AI tool calls to an empty list', () => {
      expect(aiMessage('hello')).toEqual({ type: 'ai', content: 'hello', tool_calls: [] });
    });
  });

  describe('Guards', () => {
    const call = { id: 'call_1', name: 'get_datetime_now', args: {} };

    it('should detect AI messages requesting tools', () => {
      expect(hasToolCalls(aiMessage('', { tool_calls: [call] }))).toBe(true);
      expect(hasToolCalls(aiMessage('plain answer'))).toBe(false);
      expect(hasToolCalls(humanMessage('hi'))).toBe(false);
      expect(hasToolCalls(undefined)).toBe(false);
    });

    it('should narrow to AI messages', () => {
      expect(isAIMessage(aiMessage('x'))).toBe(true);
      expect(isAIMessage(toolMessage('x', 'call_1'))).toBe(false);
    });
  });

  describe('serializeMessage', () => {
    it('should copy tool call arguments', () => {
      const original = aiMessage('', {
        tool_calls: [{ id: 'call_1', name: 'search', args: { query: { text: 'cats' } } }],
      });

      const serialized = serializeMessage(original);
      const copiedArgs = serialized.type === 'ai' ? serialized.tool_calls?.[0].args : undefined;
      expect(copiedArgs).toEqual({ query: { text: 'cats' } });
      expect(copiedArgs).not.toBe(original.tool_calls[0].args);
    });
  });

  describe('deserializeMessage', () => {
    it('should rebuild every known variant', () => {
      const records = [
        { type: 'system', content: 'sys' },
        { type: 'human', content: 'hi', name: 'ada' },
        {
          type: 'ai',
          content: '',
          tool_calls: [{ id: 'call_9', name: 'get_datetime_now', args: {} }],
        },
        { type: 'tool', content: '"2024-01-01T00:00:00.000Z"', tool_call_id: 'call_9' },
      ];

      expect(records.map(deserializeMessage)).toEqual(records);
    });

    it('should fill in missing AI tool calls', () => {
      expect(deserializeMessage({ type: 'ai', content: 'ok' })).toEqual({
        type: 'ai',
        content: 'ok',
        tool_calls: [],
      });
    });

    it('should reject tags outside the variant set', () => {
      expect(() => deserializeMessage({ type: '__import__', content: 'os' })).toThrow(
        UnknownMessageVariantError
      );

      try {
        deserializeMessage({ type: 'function', content: '' });
        throw new Error('expected deserializeMessage to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(UnknownMessageVariantError);
        if (error instanceof UnknownMessageVariantError) {
          expect(error.tag).toBe('function');
          expect(error.code).toBe('UNKNOWN_MESSAGE_VARIANT');
          expect(error.message).toBe('Unknown message variant: "function"');
        }
      }
    });

    it('should reject records that are not objects', () => {
      expect(() => deserializeMessage(null)).toThrow(UnknownMessageVariantError);
      expect(() => deserializeMessage('human')).toThrow(UnknownMessageVariantError);
      expect(() => deserializeMessage([{ type: 'human' }])).toThrow(
        UnknownMessageVariantError
      );
    });

    it('should reject malformed known variants as corrupted state', () => {
      expect(() => deserializeMessage({ type: 'tool', content: 'x' })).toThrow(
        CorruptedStateError
      );
      expect(() => deserializeMessage({ type: 'human', content: 42 })).toThrow(
        "Malformed 'human' message: content Expected string, received number"
      );
    });
  });

  describe('findOrphanToolMessages', () => {
    it('should report tool messages without a preceding request', () => {
      const orphan = toolMessage('"late"', 'call_x');
      const messages = [
        humanMessage('time?'),
        aiMessage('', { tool_calls: [{ id: 'call_1', name: 'get_datetime_now', args: {} }] }),
        toolMessage('"now"', 'call_1'),
        orphan,
      ];

      expect(findOrphanToolMessages(messages)).toEqual([orphan]);
    });
  });
});
