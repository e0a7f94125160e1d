/**
 * MemoryGraphStateStore Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { MemoryGraphStateStore } from '../src/persistence/memory-store';
import { aiMessage, humanMessage } from '../src/schema/message-schema';
import { SerializedState, serializeState } from '../src/serializer/state-serializer';

const stateWith = (...contents: string[]): SerializedState =>
  serializeState({
    messages: contents.map((content, index) =>
      index % 2 === 0 ? humanMessage(content) : aiMessage(content)
    ),
    chat_profile: 'Simple Chat',
  });

describe('MemoryGraphStateStore', () => {
  let store: MemoryGraphStateStore;

  beforeEach(() => {
    store = new MemoryGraphStateStore();
  });

  it('should return null for a thread never saved', async () => {
    await expect(store.get('unknown-thread')).resolves.toBeNull();
  });

  it('should save and load a record', async () => {
    await store.upsert('thread-1', 'Simple Chat', stateWith('hi', 'hello'));

    const record = await store.get('thread-1');
    expect(record?.threadId).toBe('thread-1');
    expect(record?.workflow).toBe('Simple Chat');
    expect(record?.state).toEqual(stateWith('hi', 'hello'));
    expect(record?.updatedAt).toBeInstanceOf(Date);
  });

  it('should replace the record on every upsert', async () => {
    await store.upsert('thread-1', 'Simple Chat', stateWith('hi'));
    await store.upsert('thread-1', 'Simple Chat', stateWith('hi', 'hello', 'bye'));
    await store.upsert('thread-1', 'Simple Chat', stateWith('hi', 'hello', 'bye'));

    const record = await store.get('thread-1');
    expect(record?.state).toEqual(stateWith('hi', 'hello', 'bye'));
    expect(store.getAllThreadIds()).toEqual(['thread-1']);
  });

  it('should keep threads apart', async () => {
    await store.upsert('thread-a', 'Simple Chat', stateWith('a'));
    await store.upsert('thread-b', 'Simple Chat', stateWith('b'));

    expect((await store.get('thread-a'))?.state).toEqual(stateWith('a'));
    expect((await store.get('thread-b'))?.state).toEqual(stateWith('b'));
  });

  it('should not share stored documents with callers', async () => {
    const state = stateWith('hi');
    await store.upsert('thread-1', 'Simple Chat', state);
    state.messages.push({ type: 'human', content: 'sneaky' });

    const loaded = await store.get('thread-1');
    expect(loaded?.state).toEqual(stateWith('hi'));

    if (loaded) loaded.state.chat_profile = 'changed';
    expect((await store.get('thread-1'))?.state.chat_profile).toBe('Simple Chat');
  });

  it('should hand out a fresh timestamp on every read', async () => {
    await store.upsert('thread-1', 'Simple Chat', stateWith('hi'));

    const first = await store.get('thread-1');
    const saved = first?.updatedAt.getTime();
    first?.updatedAt.setTime(0);

    const second = await store.get('thread-1');
    expect(second?.updatedAt).toBeInstanceOf(Date);
    expect(second?.updatedAt.getTime()).toBe(saved);
  });

  it('should forget everything on clearAll', async () => {
    await store.upsert('thread-1', 'Simple Chat', stateWith('hi'));
    store.clearAll();

    await expect(store.get('thread-1')).resolves.toBeNull();
  });
});
