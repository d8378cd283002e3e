import { Injectable } from '@nestjs/common';
import {
  ClockAdvance,
  GravityClock,
} from '../interfaces/gravity-clock.interface';

/**
 * 중력 시계. 폴링(화면 갱신) 주기와 분리된 고정 간격으로 중력 틱을 발생시킨다.
 * 상태는 호출자가 소유하고, 모든 메서드는 새 상태를 반환한다.
 */
@Injectable()
export class StepSchedulerService {
  intervalFromUpdatesPerSecond(updatesPerSecond: number): number {
    return Math.floor((1 / updatesPerSecond) * 1000);
  }

  createClock(intervalMs: number): GravityClock {
    return {
      intervalMs,
      accumulatedMs: 0,
      lastPollAt: null,
      gravityTicks: 0,
    };
  }

  // 한 번의 폴링에서 중력 틱은 최대 1회
  advance(clock: GravityClock, elapsedMs: number): ClockAdvance {
    const accumulatedMs = clock.accumulatedMs + Math.max(0, elapsedMs);

    if (accumulatedMs >= clock.intervalMs) {
      return {
        clock: {
          ...clock,
          accumulatedMs: 0,
          gravityTicks: clock.gravityTicks + 1,
        },
        gravityDue: true,
      };
    }

    return { clock: { ...clock, accumulatedMs }, gravityDue: false };
  }

  poll(clock: GravityClock, now: number): ClockAdvance {
    // 첫 폴링은 기준 시각만 기록
    const elapsedMs = clock.lastPollAt === null ? 0 : now - clock.lastPollAt;
    const result = this.advance(clock, elapsedMs);
    return {
      clock: { ...result.clock, lastPollAt: now },
      gravityDue: result.gravityDue,
    };
  }
}
