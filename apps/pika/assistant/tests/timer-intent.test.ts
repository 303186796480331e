import { describe, it, expect } from 'vitest';
import {
    detectTimerRequest,
    extractTimeFromText,
    formatDuration,
    mentionsTimer,
    parseTimeToSeconds,
} from '../src/services/timer-intent.js';

describe('parseTimeToSeconds', () => {
    it('parses hh:mm:ss', () => {
        expect(parseTimeToSeconds('01:02:03')).toBe(3723);
    });

    it('parses mm:ss', () => {
        expect(parseTimeToSeconds('5:00')).toBe(300);
    });

    it('parses bare seconds after trimming', () => {
        expect(parseTimeToSeconds(' 45 ')).toBe(45);
    });

    it('rejects out-of-range fields', () => {
        expect(parseTimeToSeconds('1:60')).toBeNull();
        expect(parseTimeToSeconds('00:60:00')).toBeNull();
    });

    it('rejects anything else', () => {
        expect(parseTimeToSeconds('abc')).toBeNull();
        expect(parseTimeToSeconds('5 minutes')).toBeNull();
        expect(parseTimeToSeconds('')).toBeNull();
        expect(parseTimeToSeconds('123:00')).toBeNull();
    });
});

describe('extractTimeFromText', () => {
    it('reads minutes', () => {
        expect(extractTimeFromText('set a timer for 5 minutes')).toEqual({ seconds: 300, formatted: '00:05:00' });
    });

    it('reads hours and minutes', () => {
        expect(extractTimeFromText('Timer for 1 hour and 30 minutes')).toEqual({ seconds: 5400, formatted: '01:30:00' });
    });

    it('reads minutes and seconds with short units', () => {
        expect(extractTimeFromText('countdown 2 min 15 sec')).toEqual({ seconds: 135, formatted: '00:02:15' });
    });

    it('reads abbreviated hours', () => {
        expect(extractTimeFromText('remind me in 3 hrs')).toEqual({ seconds: 10800, formatted: '03:00:00' });
    });

    it('reads compact units written without spaces', () => {
        expect(extractTimeFromText('timer 2h30m')).toEqual({ seconds: 9000, formatted: '02:30:00' });
        expect(extractTimeFromText('countdown 10m30s')).toEqual({ seconds: 630, formatted: '00:10:30' });
        expect(extractTimeFromText('timer 2h')).toEqual({ seconds: 7200, formatted: '02:00:00' });
    });

    it('does not read a unit letter that starts a word', () => {
        expect(extractTimeFromText('timer for 5 mangoes')).toBeNull();
    });

    it('normalizes seconds above a minute', () => {
        expect(extractTimeFromText('timer for 90 seconds')).toEqual({ seconds: 90, formatted: '00:01:30' });
    });

    it('prefers the first pattern in list order', () => {
        expect(extractTimeFromText('timer 10:30 for 2 hours')).toEqual({ seconds: 630, formatted: '00:10:30' });
        expect(extractTimeFromText('12:34:56')).toEqual({ seconds: 45296, formatted: '12:34:56' });
    });

    it('returns null for zero or missing durations', () => {
        expect(extractTimeFromText('timer for 0 minutes')).toBeNull();
        expect(extractTimeFromText('hello there')).toBeNull();
    });
});

describe('formatDuration', () => {
    it('zero-pads every field', () => {
        expect(formatDuration(3723)).toBe('01:02:03');
        expect(formatDuration(59)).toBe('00:00:59');
        expect(formatDuration(0)).toBe('00:00:00');
    });

    it('does not cap hours', () => {
        expect(formatDuration(360000)).toBe('100:00:00');
    });
});

describe('timer keywords', () => {
    it('matches keywords case-insensitively', () => {
        expect(mentionsTimer('Set an ALARM please')).toBe(true);
        expect(mentionsTimer('what time is it')).toBe(false);
    });

    it('accepts extra keywords', () => {
        expect(mentionsTimer('pomodoro please', ['pomodoro'])).toBe(true);
    });

    it('needs both a keyword and a duration', () => {
        expect(detectTimerRequest('wait 5 minutes')).toBeNull();
        expect(detectTimerRequest('set a timer')).toBeNull();
        expect(detectTimerRequest('set a timer for 5 minutes')).toEqual({ seconds: 300, formatted: '00:05:00' });
    });
});
