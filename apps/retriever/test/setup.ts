import { vi, afterEach } from 'vitest';

// Tests assert on log calls instead of printing them.
vi.mock('../src/infrastructure/logger', () => ({
    default: {
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        debug: vi.fn(),
    },
}));

afterEach(() => {
    vi.clearAllMocks();
});
