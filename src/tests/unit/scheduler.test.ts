import { describe, it, expect, vi, beforeEach } from 'vitest';
import { scheduleSessionSweep } from '../../scheduler/index.js';
import { SessionRegistry } from '../../core/assistant/SessionRegistry.js';

const cronMock = vi.hoisted(() => ({
  schedule: vi.fn<(expression: string, task: () => void, options: { timezone: string }) => { stop: () => void }>(),
  validate: vi.fn((expression: string) => expression !== 'every tuesday'),
}));

vi.mock('node-cron', () => ({ default: cronMock }));

describe('scheduleSessionSweep', () => {
  let sessions: SessionRegistry;

  beforeEach(() => {
    cronMock.schedule.mockReset();
    cronMock.schedule.mockReturnValue({ stop: vi.fn() });
    sessions = new SessionRegistry(vi.fn());
  });

  function scheduledTask(): () => void {
    const task = cronMock.schedule.mock.calls[0]?.[1];
    if (!task) throw new Error('nothing was scheduled');
    return task;
  }

  it('should schedule the sweep in the configured timezone', () => {
    scheduleSessionSweep(sessions, '*/15 * * * *', 240, 'Europe/London');

    expect(cronMock.schedule).toHaveBeenCalledWith('*/15 * * * *', expect.any(Function), { timezone: 'Europe/London' });
  });

  it('should sweep sessions idle for the configured minutes', () => {
    const sweep = vi.spyOn(sessions, 'sweepIdle');
    scheduleSessionSweep(sessions, '*/15 * * * *', 240, 'UTC');

    scheduledTask()();

    expect(sweep).toHaveBeenCalledWith(14_400_000);
  });

  it('should keep the job alive when a sweep fails', () => {
    vi.spyOn(sessions, 'sweepIdle').mockImplementation(() => {
      throw new Error('sweep failed');
    });
    scheduleSessionSweep(sessions, '*/15 * * * *', 240, 'UTC');

    expect(() => scheduledTask()()).not.toThrow();
  });

  it('should reject an invalid expression', () => {
    expect(() => scheduleSessionSweep(sessions, 'every tuesday', 240, 'UTC')).toThrow(
      'Invalid SESSION_SWEEP_CRON expression: every tuesday'
    );
    expect(cronMock.schedule).not.toHaveBeenCalled();
  });
});
