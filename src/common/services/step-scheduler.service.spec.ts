import { StepSchedulerService } from './step-scheduler.service';

describe('StepSchedulerService', () => {
  const scheduler = new StepSchedulerService();

  it.each([
    [1, 1000],
    [3, 333],
    [6, 166],
  ])('turns %d updates per second into %dms', (ups, expected) => {
    expect(scheduler.intervalFromUpdatesPerSecond(ups)).toBe(expected);
  });

  describe('advance', () => {
    it('accumulates time below the interval', () => {
      const clock = scheduler.createClock(1000);

      const result = scheduler.advance(clock, 400);

      expect(result.gravityDue).toBe(false);
      expect(result.clock.accumulatedMs).toBe(400);
      expect(clock.accumulatedMs).toBe(0);
    });

    it('fires once the interval is reached and resets', () => {
      const first = scheduler.advance(scheduler.createClock(1000), 600);
      const second = scheduler.advance(first.clock, 400);

      expect(second.gravityDue).toBe(true);
      expect(second.clock.accumulatedMs).toBe(0);
      expect(second.clock.gravityTicks).toBe(1);
    });

    it('fires at most once however long the gap', () => {
      const result = scheduler.advance(scheduler.createClock(1000), 5000);

      expect(result.gravityDue).toBe(true);
      expect(result.clock.gravityTicks).toBe(1);
      expect(result.clock.accumulatedMs).toBe(0);
    });

    it('ignores negative elapsed time', () => {
      const result = scheduler.advance(scheduler.createClock(1000), -50);

      expect(result.gravityDue).toBe(false);
      expect(result.clock.accumulatedMs).toBe(0);
    });
  });

  describe('poll', () => {
    it('measures elapsed time between polls', () => {
      let clock = scheduler.createClock(1000);

      let result = scheduler.poll(clock, 1000);
      expect(result.gravityDue).toBe(false);
      expect(result.clock.lastPollAt).toBe(1000);
      clock = result.clock;

      result = scheduler.poll(clock, 1500);
      expect(result.gravityDue).toBe(false);
      expect(result.clock.accumulatedMs).toBe(500);
      clock = result.clock;

      result = scheduler.poll(clock, 2000);
      expect(result.gravityDue).toBe(true);
      expect(result.clock.lastPollAt).toBe(2000);
    });
  });
});
