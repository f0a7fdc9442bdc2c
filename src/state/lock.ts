import { existsSync, lstatSync } from 'node:fs'
import { readFile, unlink, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { PreconditionError } from '../errors'
import { isProcessAlive } from '../util/process'

const LOCK_FILE = '.asset-sync-lock.json'
const LOCK_MODE = 0o600
/** A lock older than this is stale even if its PID was reused. */
const LOCK_MAX_AGE_MS = 12 * 60 * 60 * 1000

const LockPayloadSchema = z.object({
	pid: z.number().int().positive(),
	createdAt: z.number(),
})

type LockPayload = z.infer<typeof LockPayloadSchema>

/** Stands in for a lock file whose payload cannot be read. */
const STALE_LOCK: LockPayload = { pid: 0, createdAt: 0 }

/** The lock lives beside the spreadsheet it protects. */
export function resolveLockPath(spreadsheetPath: string): string {
	return path.join(path.dirname(path.resolve(spreadsheetPath)), LOCK_FILE)
}

function lockContention(lockPath: string, holder?: number): PreconditionError {
	return new PreconditionError('Another sync run is in progress', {
		code: 'E_LOCK_CONTENTION',
		context: holder === undefined ? { lockPath } : { lockPath, pid: holder },
	})
}

async function readLock(lockPath: string): Promise<LockPayload | null> {
	if (!existsSync(lockPath)) return null
	const statInfo = lstatSync(lockPath)
	if (statInfo.isSymbolicLink()) {
		throw new PreconditionError(
			`Refusing to read symlinked lock file: ${lockPath}`,
			{ context: { lockPath } },
		)
	}
	const raw = await readFile(lockPath, 'utf8')
	let json: unknown
	try {
		json = JSON.parse(raw)
	} catch {
		return STALE_LOCK
	}
	const parsed = LockPayloadSchema.safeParse(json)
	return parsed.success ? parsed.data : STALE_LOCK
}

/** Acquire the run lock for an --execute run against `spreadsheetPath`. */
export async function acquireLock(spreadsheetPath: string): Promise<string> {
	const lockPath = resolveLockPath(spreadsheetPath)
	const existing = await readLock(lockPath)
	if (existing) {
		const age = Date.now() - existing.createdAt
		if (
			existing.pid > 0 &&
			age < LOCK_MAX_AGE_MS &&
			isProcessAlive(existing.pid)
		) {
			throw lockContention(lockPath, existing.pid)
		}
		await unlink(lockPath)
	}

	const payload: LockPayload = { pid: process.pid, createdAt: Date.now() }
	try {
		await writeFile(lockPath, JSON.stringify(payload), {
			encoding: 'utf8',
			mode: LOCK_MODE,
			flag: 'wx',
		})
	} catch (error: unknown) {
		if (
			error instanceof Error &&
			'code' in error &&
			error.code === 'EEXIST'
		) {
			throw lockContention(lockPath)
		}
		throw error
	}
	return lockPath
}

/** Release a lock taken by acquireLock. */
export async function releaseLock(lockPath: string): Promise<void> {
	if (!existsSync(lockPath)) return
	await unlink(lockPath)
}
