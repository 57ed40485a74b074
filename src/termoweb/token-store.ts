// src/termoweb/token-store.ts
import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import type { Credential } from './session-manager.js';
import { isRecord } from './http.js';

/**
 * JSON credential store under the Homebridge storage path.
 *
 * Files are stored at:
 *   <storagePath>/homebridge-termoweb/credential.json
 */
export class TokenStore {
	private readonly dirPath: string;
	private readonly filePath: string;

	public constructor(storagePath: string) {
		this.dirPath = path.join(storagePath, 'homebridge-termoweb');
		this.filePath = path.join(this.dirPath, 'credential.json');
	}

	/**
	 * Returns the stored credential, or null when there is none, it cannot be
	 * read, or it has already expired.
	 */
	public async load(now: number = Date.now()): Promise<Credential | null> {
		let raw: string;
		try {
			raw = await fs.readFile(this.filePath, 'utf8');
		} catch {
			// missing file means no stored token
			return null;
		}

		let data: unknown;
		try {
			data = JSON.parse(raw);
		} catch {
			return null;
		}

		if (!isRecord(data) || typeof data.accessToken !== 'string' || data.accessToken === '') {
			return null;
		}

		const expiresAt = typeof data.expiresAt === 'number' ? data.expiresAt : undefined;
		if (expiresAt !== undefined && expiresAt <= now) {
			return null;
		}

		return {
			accessToken: data.accessToken,
			tokenType: typeof data.tokenType === 'string' ? data.tokenType : 'Bearer',
			expiresAt,
			refreshToken: typeof data.refreshToken === 'string' ? data.refreshToken : undefined,
			invalid: false,
		};
	}

	public async save(credential: Credential): Promise<void> {
		const json = JSON.stringify(
			{
				accessToken: credential.accessToken,
				tokenType: credential.tokenType,
				expiresAt: credential.expiresAt,
				refreshToken: credential.refreshToken,
			},
			null,
			2,
		);

		await fs.mkdir(this.dirPath, { recursive: true });
		await fs.writeFile(this.filePath, json, { encoding: 'utf8', mode: 0o600 });
	}

	public async clear(): Promise<void> {
		await fs.rm(this.filePath, { force: true });
	}
}
