import { describe, it, expect } from 'vitest';
import { isValidId, timestampId } from '../../src/util/ids';

describe('ids', () => {
    it('should format the UTC timestamp with the given suffix', () => {
        expect(timestampId(new Date('2024-03-15T14:22:33.456Z'), 'a1b2c3')).toBe('20240315-142233-a1b2c3');
    });

    it('should zero-pad single digit fields', () => {
        expect(timestampId(new Date('2025-01-02T03:04:05Z'), 'ffffff')).toBe('20250102-030405-ffffff');
    });

    it('should add a random hex suffix by default', () => {
        expect(timestampId(new Date('2024-03-15T14:22:33Z'))).toMatch(/^20240315-142233-[0-9a-f]{6}$/);
    });

    it('should accept only file-name safe ids', () => {
        expect(isValidId('20240315-142233-a1b2c3')).toBe(true);
        expect(isValidId('my_note')).toBe(true);
        expect(isValidId('../etc/passwd')).toBe(false);
        expect(isValidId('a b')).toBe(false);
        expect(isValidId('')).toBe(false);
    });
});
