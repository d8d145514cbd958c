import { createBookingTestingModule } from '../../testing/booking-testing-module';
import { makeBooking, makeResource } from '../../testing/fixtures';
import { BookingStatus } from '../entities/booking.entity';
import { InMemoryBookingRepository } from '../repositories/in-memory-booking.repository';
import { BookingLifecycleScheduler } from './booking-lifecycle.scheduler';
import { BookingWorkflowService } from './booking-workflow.service';

describe('BookingLifecycleScheduler', () => {
  let scheduler: BookingLifecycleScheduler;
  let workflow: BookingWorkflowService;
  let bookings: InMemoryBookingRepository;

  beforeEach(async () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2025-01-06T10:30:00Z'));

    const context = await createBookingTestingModule([makeResource()]);
    scheduler = context.module.get<BookingLifecycleScheduler>(
      BookingLifecycleScheduler,
    );
    workflow = context.module.get<BookingWorkflowService>(BookingWorkflowService);
    bookings = context.bookings;

    await bookings.saveMany([
      makeBooking({ id: 'due-start', status: BookingStatus.CONFIRMED }),
      makeBooking({
        id: 'later',
        start_time: new Date('2025-01-06T12:00:00Z'),
        end_time: new Date('2025-01-06T13:00:00Z'),
        status: BookingStatus.CONFIRMED,
      }),
      makeBooking({
        id: 'due-end',
        start_time: new Date('2025-01-06T09:00:00Z'),
        end_time: new Date('2025-01-06T10:00:00Z'),
        status: BookingStatus.IN_USE,
      }),
      makeBooking({
        id: 'missed',
        start_time: new Date('2025-01-06T08:00:00Z'),
        end_time: new Date('2025-01-06T09:00:00Z'),
        status: BookingStatus.CONFIRMED,
      }),
      makeBooking({
        id: 'approved',
        start_time: new Date('2025-01-06T07:00:00Z'),
        end_time: new Date('2025-01-06T08:00:00Z'),
        status: BookingStatus.APPROVED,
      }),
    ]);
  });

  afterEach(() => {
    scheduler.stop();
    jest.restoreAllMocks();
    jest.useRealTimers();
  });

  const statusOf = async (id: string) => (await bookings.findById(id))?.status;

  describe('sweep', () => {
    it('should advance only the bookings that are due', async () => {
      const result = await scheduler.sweep();

      expect(result).toEqual({ started: 2, completed: 2, failed: 0 });
      expect(await statusOf('due-start')).toBe(BookingStatus.IN_USE);
      expect(await statusOf('later')).toBe(BookingStatus.CONFIRMED);
      expect(await statusOf('due-end')).toBe(BookingStatus.COMPLETED);
      expect(await statusOf('missed')).toBe(BookingStatus.COMPLETED);
      expect(await statusOf('approved')).toBe(BookingStatus.APPROVED);
    });

    it('should keep going when one booking fails', async () => {
      const transition = workflow.transition.bind(workflow);
      jest
        .spyOn(workflow, 'transition')
        .mockImplementation((bookingId, to, actor, reason) =>
          bookingId === 'due-start'
            ? Promise.reject(new Error('store hiccup'))
            : transition(bookingId, to, actor, reason),
        );

      const result = await scheduler.sweep();

      expect(result).toEqual({ started: 1, completed: 2, failed: 1 });
      expect(await statusOf('due-start')).toBe(BookingStatus.CONFIRMED);
    });

    it('should skip a sweep while another one is running', async () => {
      const [first, second] = await Promise.all([
        scheduler.sweep(),
        scheduler.sweep(),
      ]);

      expect(first.started).toBe(2);
      expect(second).toEqual({ started: 0, completed: 0, failed: 0 });
    });
  });

  describe('timer', () => {
    it('should sweep on every interval until stopped', () => {
      const sweep = jest
        .spyOn(scheduler, 'sweep')
        .mockResolvedValue({ started: 0, completed: 0, failed: 0 });

      scheduler.start();
      jest.advanceTimersByTime(60_000);
      expect(sweep).toHaveBeenCalledTimes(1);

      jest.advanceTimersByTime(60_000);
      expect(sweep).toHaveBeenCalledTimes(2);

      scheduler.stop();
      jest.advanceTimersByTime(60_000);
      expect(sweep).toHaveBeenCalledTimes(2);
    });

    it('should not start when the sweep is disabled', () => {
      scheduler.onApplicationBootstrap();

      expect(jest.getTimerCount()).toBe(0);
    });
  });
});
