/**
 * Check whether a process with the given PID is still running.
 *
 * Signal 0 performs error checking without delivering a signal. EPERM means
 * the process exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0)
		return true
	} catch (error: unknown) {
		return error instanceof Error && 'code' in error && error.code === 'EPERM'
	}
}
