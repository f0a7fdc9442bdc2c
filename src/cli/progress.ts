import type { ProgressMode } from './output'

/** Row progress on stderr; animated mode rewrites a single line. */
export class ProgressDisplay {
	private lastLineLength = 0

	constructor(private readonly mode: ProgressMode) {}

	update(current: number, total: number, message?: string): void {
		if (this.mode === 'off') return
		const base = `Progress ${current}/${total}`
		const line = message ? `${base} - ${message}` : base
		this.writeLine(line, this.mode === 'animated')
	}

	/** Break out of the animated line before something else writes to the terminal. */
	interrupt(): void {
		if (this.mode === 'animated' && this.lastLineLength > 0) {
			process.stderr.write('\n')
			this.lastLineLength = 0
		}
	}

	pause(message: string): void {
		if (this.mode === 'off') return
		this.interrupt()
		this.writeLine(`Paused: ${message}`, false)
	}

	finish(): void {
		if (this.mode === 'off') return
		this.interrupt()
	}

	private writeLine(line: string, overwrite: boolean): void {
		if (!overwrite) {
			process.stderr.write(`${line}\n`)
			this.lastLineLength = 0
			return
		}
		const padding =
			this.lastLineLength > line.length
				? ' '.repeat(this.lastLineLength - line.length)
				: ''
		process.stderr.write(`\r${line}${padding}`)
		this.lastLineLength = line.length
	}
}
