import { beforeEach, describe, expect, test, vi } from 'vitest';

const { mockQuestion, mockClose } = vi.hoisted(() => ({
    mockQuestion: vi.fn(),
    mockClose: vi.fn(),
}));

vi.mock('readline', () => ({
    createInterface: vi.fn(() => ({
        question: mockQuestion,
        close: mockClose,
    })),
}));

import { confirm, isAffirmative } from '../../src/util/prompt';

describe('prompt utility', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    test('isAffirmative accepts y and yes in any case', () => {
        expect(isAffirmative('y')).toBe(true);
        expect(isAffirmative(' YES ')).toBe(true);
        expect(isAffirmative('no')).toBe(false);
        expect(isAffirmative('')).toBe(false);
    });

    test('confirm asks once and closes the interface', async () => {
        mockQuestion.mockImplementation((_question: string, callback: (answer: string) => void) => callback(' Yes '));

        expect(await confirm('Process 3 file(s)?')).toBe(true);
        expect(mockQuestion).toHaveBeenCalledWith('Process 3 file(s)? [y/N] ', expect.any(Function));
        expect(mockClose).toHaveBeenCalledTimes(1);
    });

    test('confirm treats anything else as no', async () => {
        mockQuestion.mockImplementation((_question: string, callback: (answer: string) => void) => callback('maybe'));

        expect(await confirm('Continue?')).toBe(false);
        expect(mockClose).toHaveBeenCalledTimes(1);
    });
});
