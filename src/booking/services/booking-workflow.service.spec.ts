import {
  BookingConflictError,
  InvalidTransitionError,
  NotFoundError,
  UnauthorizedError,
} from '../../common/errors/booking.errors';
import { ResourceCategory } from '../../resource/entities/resource.entity';
import {
  createBookingTestingModule,
  flushNotifications,
  RecordingNotifier,
} from '../../testing/booking-testing-module';
import { makeBooking, makeResource, userActor } from '../../testing/fixtures';
import { SYSTEM_ACTOR } from '../booking-actor';
import { BookingStatus } from '../entities/booking.entity';
import { InMemoryBookingRepository } from '../repositories/in-memory-booking.repository';
import { BookingWorkflowService } from './booking-workflow.service';

describe('BookingWorkflowService', () => {
  let workflow: BookingWorkflowService;
  let bookings: InMemoryBookingRepository;
  let notifier: RecordingNotifier;

  const manager = userActor('manager-1', [ResourceCategory.MEETING_ROOM]);
  const technician = userActor('tech-1', [ResourceCategory.IT_EQUIPMENT]);
  const requester = userActor('user-a');
  const stranger = userActor('user-z');

  beforeEach(async () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2025-01-06T08:00:00Z'));

    const context = await createBookingTestingModule([makeResource()]);
    workflow = context.module.get<BookingWorkflowService>(BookingWorkflowService);
    bookings = context.bookings;
    notifier = context.notifier;
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('approve', () => {
    it('should record the approver and notify', async () => {
      await bookings.save(makeBooking());

      const approved = await workflow.approve('b-1', manager);
      await flushNotifications();

      expect(approved.status).toBe(BookingStatus.APPROVED);
      expect(approved.approver_id).toBe('manager-1');
      expect(approved.approved_at?.toISOString()).toBe('2025-01-06T08:00:00.000Z');
      expect((await bookings.findById('b-1'))?.status).toBe(BookingStatus.APPROVED);
      expect(notifier.events.map((event) => event.type)).toEqual([
        'booking.approved',
      ]);
    });

    it('should refuse the requester approving their own booking', async () => {
      await bookings.save(makeBooking());

      await expect(workflow.approve('b-1', requester)).rejects.toThrow(
        UnauthorizedError,
      );
    });

    it('should refuse approvers scoped to other categories', async () => {
      await bookings.save(makeBooking());

      await expect(workflow.approve('b-1', technician)).rejects.toThrow(
        'tech-1 is not allowed to move booking b-1 from PENDING to APPROVED',
      );
    });

    it('should re-check conflicts before approving', async () => {
      await bookings.saveMany([
        makeBooking({ id: 'b-1' }),
        makeBooking({
          id: 'b-2',
          start_time: new Date('2025-01-06T10:30:00Z'),
          end_time: new Date('2025-01-06T11:30:00Z'),
          status: BookingStatus.APPROVED,
        }),
      ]);

      await expect(workflow.approve('b-1', manager)).rejects.toThrow(
        BookingConflictError,
      );
      expect((await bookings.findById('b-1'))?.status).toBe(BookingStatus.PENDING);
    });

    it('should let only one of two concurrent approvals succeed', async () => {
      await bookings.save(makeBooking());

      const results = await Promise.allSettled([
        workflow.approve('b-1', manager),
        workflow.approve('b-1', manager),
      ]);

      const rejected = results.filter(
        (result): result is PromiseRejectedResult => result.status === 'rejected',
      );
      expect(rejected).toHaveLength(1);
      expect(rejected[0].reason).toBeInstanceOf(InvalidTransitionError);
    });

    it('should fail for unknown bookings', async () => {
      await expect(workflow.approve('missing', manager)).rejects.toThrow(
        NotFoundError,
      );
    });
  });

  describe('illegal transitions', () => {
    it('should reject edges missing from the table', async () => {
      await bookings.save(makeBooking());

      await expect(
        workflow.transition('b-1', BookingStatus.COMPLETED, SYSTEM_ACTOR),
      ).rejects.toThrow('Cannot move booking b-1 from PENDING to COMPLETED');
    });

    it('should keep terminal statuses terminal', async () => {
      await bookings.save(makeBooking({ status: BookingStatus.REJECTED }));

      const attempt = workflow.approve('b-1', manager);

      await expect(attempt).rejects.toThrow(InvalidTransitionError);
      await expect(attempt).rejects.toThrow(
        'Cannot move booking b-1 from REJECTED to APPROVED: REJECTED is a final status',
      );
    });

    it('should check the edge before the actor', async () => {
      await bookings.save(makeBooking({ status: BookingStatus.CANCELLED }));

      await expect(workflow.approve('b-1', stranger)).rejects.toThrow(
        InvalidTransitionError,
      );
    });
  });

  describe('reject', () => {
    it('should store the reason and notify', async () => {
      await bookings.save(makeBooking());

      const rejected = await workflow.reject('b-1', manager, 'Room is reserved');
      await flushNotifications();

      expect(rejected.status).toBe(BookingStatus.REJECTED);
      expect(rejected.status_reason).toBe('Room is reserved');
      expect(rejected.approver_id).toBe('manager-1');
      expect(rejected.approved_at).toBeNull();
      expect(notifier.events.map((event) => event.type)).toEqual([
        'booking.rejected',
      ]);
    });
  });

  describe('confirm', () => {
    it('should confirm an approved booking before it starts', async () => {
      await bookings.save(makeBooking({ status: BookingStatus.APPROVED }));

      expect((await workflow.confirm('b-1', manager)).status).toBe(
        BookingStatus.CONFIRMED,
      );
    });

    it('should allow confirmation exactly at the start', async () => {
      jest.setSystemTime(new Date('2025-01-06T10:00:00Z'));
      await bookings.save(makeBooking({ status: BookingStatus.APPROVED }));

      expect((await workflow.confirm('b-1', SYSTEM_ACTOR)).status).toBe(
        BookingStatus.CONFIRMED,
      );
    });

    it('should refuse confirmation after the start', async () => {
      jest.setSystemTime(new Date('2025-01-06T10:01:00Z'));
      await bookings.save(makeBooking({ status: BookingStatus.APPROVED }));

      await expect(workflow.confirm('b-1', manager)).rejects.toThrow(
        'Cannot move booking b-1 from APPROVED to CONFIRMED: booking has already started',
      );
    });
  });

  describe('start and complete', () => {
    it('should only let the system start a booking', async () => {
      jest.setSystemTime(new Date('2025-01-06T10:00:00Z'));
      await bookings.save(makeBooking({ status: BookingStatus.CONFIRMED }));

      await expect(workflow.start('b-1', manager)).rejects.toThrow(
        UnauthorizedError,
      );
      expect((await workflow.start('b-1')).status).toBe(BookingStatus.IN_USE);
    });

    it('should not start a booking early', async () => {
      await bookings.save(makeBooking({ status: BookingStatus.CONFIRMED }));

      await expect(workflow.start('b-1')).rejects.toThrow(
        'booking has not started yet',
      );
    });

    it('should complete a booking once it has ended', async () => {
      await bookings.save(makeBooking({ status: BookingStatus.IN_USE }));

      jest.setSystemTime(new Date('2025-01-06T10:59:59Z'));
      await expect(workflow.complete('b-1')).rejects.toThrow(
        'booking has not ended yet',
      );

      jest.setSystemTime(new Date('2025-01-06T11:00:00Z'));
      expect((await workflow.complete('b-1')).status).toBe(
        BookingStatus.COMPLETED,
      );
    });
  });

  describe('cancel', () => {
    it('should let the requester cancel a pending booking', async () => {
      await bookings.save(makeBooking());

      const cancelled = await workflow.cancel('b-1', requester, 'Plans changed');
      await flushNotifications();

      expect(cancelled.status).toBe(BookingStatus.CANCELLED);
      expect(cancelled.status_reason).toBe('Plans changed');
      expect(notifier.events.map((event) => event.type)).toEqual([
        'booking.cancelled',
      ]);
    });

    it('should let an approver cancel a confirmed booking before it starts', async () => {
      await bookings.save(makeBooking({ status: BookingStatus.CONFIRMED }));

      expect((await workflow.cancel('b-1', manager)).status).toBe(
        BookingStatus.CANCELLED,
      );
    });

    it('should refuse cancellation by anyone else', async () => {
      await bookings.save(makeBooking());

      await expect(workflow.cancel('b-1', stranger)).rejects.toThrow(
        UnauthorizedError,
      );
    });

    it('should refuse cancelling at or after the start', async () => {
      jest.setSystemTime(new Date('2025-01-06T10:00:00Z'));
      await bookings.save(makeBooking({ status: BookingStatus.APPROVED }));

      await expect(workflow.cancel('b-1', requester)).rejects.toThrow(
        InvalidTransitionError,
      );
    });
  });
});
