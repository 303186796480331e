import type { ChatTool } from './openrouter-client.js';
import { formatDuration, parseTimeToSeconds } from './timer-intent.js';
import type { TimerService } from './timers.js';

export const SET_TIMER = 'set_timer';

export type TimerToolResult =
  | { success: true; message: string; time: string; seconds: number; timer_id: string }
  | { success: false; error: string };

export interface TimerTool {
  definition: ChatTool;
  execute(args: unknown): TimerToolResult;
}

const definition: ChatTool = {
  type: 'function',
  function: {
    name: SET_TIMER,
    description:
      "Set a timer for a specified duration. Parse time from user input in hh:mm:ss format, mm:ss format, or natural language (e.g., '5 minutes', '30 seconds', '1 hour'). Always use this function when the user wants to set a timer.",
    parameters: {
      type: 'object',
      properties: {
        time: {
          type: 'string',
          description:
            "Time duration in hh:mm:ss format (e.g., '00:05:00' for 5 minutes, '01:30:00' for 1 hour 30 minutes, '00:00:30' for 30 seconds). Convert natural language times to this format.",
        },
      },
      required: ['time'],
    },
  },
};

const readTime = (args: unknown): string => {
  if (typeof args !== 'object' || args === null || !('time' in args)) return '';
  return typeof args.time === 'string' ? args.time : String(args.time);
};

/**
 * The `set_timer` function tool, bound to a timer service.
 */
export function createTimerTool(timers: TimerService): TimerTool {
  return {
    definition,
    execute(args) {
      const time = readTime(args);
      const seconds = parseTimeToSeconds(time);

      if (seconds === null) {
        return {
          success: false,
          error: `Invalid time format: ${time}. Expected hh:mm:ss, mm:ss, or seconds.`,
        };
      }
      if (seconds === 0) {
        return { success: false, error: 'Timer duration must be greater than zero' };
      }

      const formatted = formatDuration(seconds);
      const handle = timers.start({ seconds, formatted });
      return {
        success: true,
        message: `Timer set for ${formatted}`,
        time: formatted,
        seconds,
        timer_id: handle.id,
      };
    },
  };
}
