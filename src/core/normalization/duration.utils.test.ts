// src/core/normalization/duration.utils.test.ts
import { parseDurationToMinutes } from './duration.utils';

describe('parseDurationToMinutes', () => {
    it.each([
        ['2h30', 150],
        ['2h 30m', 150],
        ['1.5h', 90],
        ['1,5 h', 90],
        ['2 horas', 120],
        ['45m', 45],
        ['45 min', 45],
        ['1:30', 90],
        ['0:45:00', 45],
    ])('reads marked text %s as %i minutes', (text, expected) => {
        expect(parseDurationToMinutes(text)).toBe(expected);
    });

    it('treats decimals up to 24 as hours', () => {
        expect(parseDurationToMinutes('1.5')).toBe(90);
        expect(parseDurationToMinutes('1,25')).toBe(75);
        expect(parseDurationToMinutes(2.5)).toBe(150);
    });

    it('treats integers and large decimals as minutes', () => {
        expect(parseDurationToMinutes('90')).toBe(90);
        expect(parseDurationToMinutes(120)).toBe(120);
        expect(parseDurationToMinutes('30.4')).toBe(30);
        expect(parseDurationToMinutes(45.6)).toBe(46);
    });

    it('returns 0 for malformed, empty or negative values', () => {
        expect(parseDurationToMinutes('n/a')).toBe(0);
        expect(parseDurationToMinutes('')).toBe(0);
        expect(parseDurationToMinutes(null)).toBe(0);
        expect(parseDurationToMinutes(undefined)).toBe(0);
        expect(parseDurationToMinutes(-15)).toBe(0);
        expect(parseDurationToMinutes('-2h')).toBe(0);
        expect(parseDurationToMinutes(true)).toBe(0);
        expect(parseDurationToMinutes(Number.NaN)).toBe(0);
    });
});
