import { vi, type Mock } from 'vitest'

import type { Logger } from '@/logger.js'

/**
 * Logger whose methods are spies. Children share the parent's spies, so
 * assertions see entries from every component.
 */
export interface MockLogger extends Logger {
	error: Mock
	warn: Mock
	info: Mock
	debug: Mock
	trace: Mock
	child: Mock
}

export function createMockLogger(): MockLogger {
	const logger: MockLogger = {
		error: vi.fn(),
		warn: vi.fn(),
		info: vi.fn(),
		debug: vi.fn(),
		trace: vi.fn(),
		child: vi.fn(() => logger),
	}
	return logger
}
