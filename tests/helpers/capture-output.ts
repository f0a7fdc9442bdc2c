import { vi } from 'vitest'

export interface Capture {
	readonly getStdout: () => string
	readonly getStderr: () => string
	restore: () => void
}

/** Collect everything written to stdout and stderr until restored. */
export function captureOutput(): Capture {
	let stdout = ''
	let stderr = ''
	const toText = (chunk: string | Uint8Array) =>
		typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8')
	const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
		stdout += toText(chunk)
		return true
	})
	const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
		stderr += toText(chunk)
		return true
	})

	return {
		getStdout: () => stdout,
		getStderr: () => stderr,
		restore: () => {
			stdoutSpy.mockRestore()
			stderrSpy.mockRestore()
		},
	}
}
