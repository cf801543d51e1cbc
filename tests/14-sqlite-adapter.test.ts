/**
 * Segment 14: SQLite Adapter Tests
 *
 * The SQLite adapter is the production implementation of the adapter interface.
 * It must satisfy the shared adapter contract plus SQLite-specific requirements.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createSqliteAdapter,
  type SqliteAdapter,
  DuplicateKeyError,
} from '../src/sqlite-adapter';
import { describeAdapterContract } from './helpers/adapter-contract';
import { seedEvent, testUser } from './helpers/fakes';

describeAdapterContract('SQLite adapter', (departments) => createSqliteAdapter(':memory:', { departments }));

describe('Segment 14: SQLite specifics', () => {
  let adapter: SqliteAdapter;

  beforeEach(async () => {
    adapter = await createSqliteAdapter(':memory:', { departments: ['Media Center'] });
  });

  afterEach(async () => {
    await adapter.close();
  });

  it('creates the schema tables', async () => {
    expect(await adapter.listTables()).toEqual([
      'departments',
      'events',
      'reminder_receipts',
      'schema_version',
      'users',
    ]);
  });

  it('records the schema version', async () => {
    expect(await adapter.getSchemaVersion()).toBe(1);
  });

  it('wraps transaction callbacks in a database transaction', async () => {
    expect(await adapter.inTransaction()).toBe(false);
    const inside = await adapter.transaction(() => adapter.inTransaction());
    expect(inside).toBe(true);
    expect(await adapter.inTransaction()).toBe(false);
  });

  it('runs overlapping transactions one after the other', async () => {
    const order: string[] = [];
    let release: () => void = () => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const first = adapter.transaction(async () => {
      order.push('first:start');
      await held;
      order.push('first:end');
    });
    const second = adapter.transaction(async () => {
      order.push('second');
    });
    release();
    await Promise.all([first, second]);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('joins an outer transaction when nested', async () => {
    await adapter.createUser(testUser());
    await expect(
      adapter.transaction(async () => {
        await adapter.transaction(() => seedEvent(adapter, '2025-03-10', '15:00:00'));
        throw new Error('abort');
      })
    ).rejects.toThrow('abort');
    expect(await adapter.countEvents()).toBe(0);
  });

  it('maps the receipt unique constraint to DuplicateKeyError', async () => {
    await adapter.createUser(testUser());
    const id = await seedEvent(adapter, '2025-03-10', '15:00:00');
    const receipt = { eventId: id, threshold: '1h' as const, sentAt: testUser().createdAt };
    await adapter.createReceipt(receipt);
    await expect(adapter.createReceipt(receipt)).rejects.toBeInstanceOf(DuplicateKeyError);
  });
});

describe('Segment 14: SQLite persistence across reopen', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'campus-reminders-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('keeps events and receipts, and seeds departments only once', async () => {
    const path = join(dir, 'test.db');
    const first = await createSqliteAdapter(path, { departments: ['Media Center'] });
    await first.createUser(testUser());
    const id = await seedEvent(first, '2025-03-10', '15:00:00');
    await first.createReceipt({ eventId: id, threshold: '24h', sentAt: testUser().createdAt });
    await first.setDepartmentActive('Media Center', false);
    await first.close();

    const second = await createSqliteAdapter(path, { departments: ['Media Center', 'Marketing'] });
    expect((await second.getEvent(id))?.title).toBe('Open Day');
    expect((await second.getReceiptsByEvent(id)).map((r) => r.threshold)).toEqual(['24h']);
    expect(await second.getDepartments(false)).toEqual([{ name: 'Media Center', active: false }]);
    await second.close();
  });
});
