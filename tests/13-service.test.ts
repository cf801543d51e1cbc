/**
 * Segment 13: Reminder Service
 *
 * The assembled service: lifecycle and dispatch sharing one store, restart
 * safety, overlap protection and the daily digest.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { createReminderService, type ReminderService, type ReminderServiceConfig } from '../src/service';
import { createMockAdapter, type Adapter } from '../src/adapter';
import { createFakeClock, type FakeClock } from '../src/clock';
import { ValidationError } from '../src/errors';
import type { NotificationSink } from '../src/notification-sink';
import type { LocalDateTime } from '../src/time-date';
import {
  ORGANIZER_ID,
  createRecordingLogger,
  createRecordingMirror,
  createRecordingSink,
  messagesAt,
  seedEvent,
  sentPairs,
  testUser,
  type RecordingLogger,
  type RecordingSink,
} from './helpers/fakes';

const at = (s: string) => s as LocalDateTime;

async function seededAdapter(): Promise<Adapter> {
  const adapter = createMockAdapter({ departments: ['Media Center'] });
  await adapter.createUser(testUser());
  return adapter;
}

describe('Segment 13: Reminder Service', () => {
  let adapter: Adapter;
  let clock: FakeClock;
  let sink: RecordingSink;
  let logger: RecordingLogger;
  let service: ReminderService;

  function build(overrides: Partial<ReminderServiceConfig> = {}): ReminderService {
    return createReminderService({ adapter, clock, sink, logger, receiptRetryDelayMs: 0, ...overrides });
  }

  beforeEach(async () => {
    adapter = await seededAdapter();
    clock = createFakeClock(at('2025-03-01T10:00:00'));
    sink = createRecordingSink();
    logger = createRecordingLogger();
    service = build();
  });

  it('rejects a receipt attempt count below one', () => {
    expect(() => build({ receiptWriteAttempts: 0 })).toThrow(ValidationError);
  });

  describe('Lifecycle through the service', () => {
    it('creates, announces and mirrors an event', async () => {
      const mirror = createRecordingMirror();
      service = build({ mirror });
      const event = await service.createEvent({
        title: 'Open Day',
        date: '10.03.2025',
        time: '15:00',
        place: 'Main Hall',
        ownerId: ORGANIZER_ID,
      });

      expect(sink.notices.map((n) => n.kind)).toEqual(['created']);
      expect(mirror.calls).toEqual([{ op: 'created', eventId: event.id }]);
      expect(logger.entries.find((e) => e.message === 'Event created')?.namespace).toBe('test:events');
    });

    it('lets a configured admin cancel another organizer\'s event', async () => {
      service = build({ access: { adminUserIds: [1] } });
      const eventId = await seedEvent(adapter, '2025-03-10', '15:00:00');
      const cancelled = await service.cancelEvent(eventId, 1);
      expect(cancelled.cancelled).toBe(true);
    });

    it('an edit takes effect from the next cycle', async () => {
      const eventId = await seedEvent(adapter, '2025-03-10', '15:00:00');
      await service.editEvent(eventId, { time: '18:00' });

      clock.set(at('2025-03-09T15:00:00'));
      expect((await service.pollAndDispatch())?.delivered).toEqual([]);
      clock.set(at('2025-03-09T18:00:00'));
      expect((await service.pollAndDispatch())?.delivered).toEqual([{ eventId, threshold: '24h' }]);
    });
  });

  describe('Users through the service', () => {
    it('registers against the configured policy', async () => {
      service = build({ access: { adminUserIds: [5], allowedUserIds: [5, 6] } });
      const user = await service.registerUser({
        id: 5,
        fullName: 'Admin User',
        department: 'Media Center',
        phone: '+998900000005',
      });

      expect(user.isAdmin).toBe(true);
      expect(await service.isAdmin(5)).toBe(true);
      expect(service.isAllowed(6)).toBe(true);
      expect(service.isAllowed(ORGANIZER_ID)).toBe(false);
    });

    it('reports statistics', async () => {
      await seedEvent(adapter, '2025-03-10', '15:00:00');
      expect(await service.getStatistics()).toEqual({
        totalEvents: 1,
        byDepartment: [{ department: 'Media Center', count: 1 }],
      });
    });
  });

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  describe('Dispatch', () => {
    it('restarting between cycles yields the same receipts as running straight through', async () => {
      const steps = ['2025-03-09T15:00:00', '2025-03-09T15:01:00', '2025-03-10T12:00:00', '2025-03-10T15:01:00'];

      await seedEvent(adapter, '2025-03-10', '15:00:00');
      for (const step of steps) {
        clock.set(at(step));
        await service.pollAndDispatch();
        await service.stop();
        service = build();
      }

      const straightAdapter = await seededAdapter();
      await seedEvent(straightAdapter, '2025-03-10', '15:00:00');
      const straightSink = createRecordingSink();
      const straight = createReminderService({
        adapter: straightAdapter,
        clock,
        sink: straightSink,
        logger: createRecordingLogger(),
      });
      for (const step of steps) {
        clock.set(at(step));
        await straight.pollAndDispatch();
      }

      expect(await adapter.getAllReceipts()).toEqual(await straightAdapter.getAllReceipts());
      expect(sentPairs(sink)).toEqual(['1:24h', '1:3h']);
      expect(sentPairs(straightSink)).toEqual(sentPairs(sink));
    });

    it('does not overlap cycles', async () => {
      const eventId = await seedEvent(adapter, '2025-03-10', '15:00:00');
      let release: () => void = () => {};
      const held = new Promise<void>((resolve) => {
        release = resolve;
      });
      const slowSink: NotificationSink = {
        async deliverReminder(delivery) {
          await held;
          await sink.deliverReminder(delivery);
        },
        deliverNotice: (notice) => sink.deliverNotice(notice),
      };
      service = build({ sink: slowSink });
      clock.set(at('2025-03-09T15:00:00'));

      const first = service.pollAndDispatch();
      expect(await service.pollAndDispatch()).toBeNull();
      release();

      expect((await first)?.delivered).toEqual([{ eventId, threshold: '24h' }]);
      expect(sentPairs(sink)).toEqual([`${eventId}:24h`]);
      expect(messagesAt(logger, 'warn')).toEqual(['Reminder dispatch trigger skipped']);
    });
  });

  // ==========================================================================
  // Digest
  // ==========================================================================

  describe('Daily digest', () => {
    beforeEach(() => {
      clock.set(at('2025-03-10T08:00:00'));
    });

    it('posts today\'s events in time order', async () => {
      const late = await seedEvent(adapter, '2025-03-10', '18:00:00');
      const early = await seedEvent(adapter, '2025-03-10', '09:00:00');
      await seedEvent(adapter, '2025-03-11', '09:00:00');
      await seedEvent(adapter, '2025-03-10', '12:00:00', { cancelled: true });

      expect(await service.sendDailyDigest()).toBe(2);
      const [notice] = sink.notices;
      expect(notice?.kind).toBe('digest');
      if (notice?.kind === 'digest') {
        expect(notice.date).toBe('2025-03-10');
        expect(notice.events.map(({ event }) => event.id)).toEqual([early, late]);
        expect(notice.events[0]?.owner).toEqual(testUser());
      }
      expect(messagesAt(logger, 'info')).toEqual(['Daily digest sent']);
    });

    it('posts an empty digest on a quiet day', async () => {
      expect(await service.sendDailyDigest()).toBe(0);
      expect(sink.notices).toEqual([{ kind: 'digest', date: '2025-03-10', events: [] }]);
    });

    it('returns null and logs when the chat is unreachable', async () => {
      sink.failNotices(true);
      expect(await service.sendDailyDigest()).toBeNull();
      expect(logger.entries.filter((e) => e.level === 'error')).toEqual([
        {
          level: 'error',
          namespace: 'test:digest',
          message: 'Daily digest cycle failed',
          context: { error: 'SinkUnavailableError: chat unreachable' },
        },
      ]);
    });
  });

  // ==========================================================================
  // Scheduling
  // ==========================================================================

  describe('start and stop', () => {
    it('schedules both jobs', async () => {
      service.start();
      await service.stop();
      expect(messagesAt(logger, 'info')).toEqual([
        'Reminder dispatch started',
        'Daily digest started',
        'Reminder dispatch stopped',
        'Daily digest stopped',
      ]);
    });

    it('leaves the digest unscheduled when disabled', async () => {
      service = build({ digestCron: null });
      service.start();
      await service.stop();
      expect(messagesAt(logger, 'info')).toEqual(['Reminder dispatch started', 'Reminder dispatch stopped']);
    });
  });
});
