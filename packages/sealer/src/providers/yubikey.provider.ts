import {
	type DeviceIdentity,
	type IChallengeResponseProvider,
	type ProviderCallOptions,
	ProviderError,
	type ProviderSlot,
	ProviderUnavailableError,
} from '@hwseal/core';
import { Logger } from '@nestjs/common';
import { DEFAULT_TIMEOUT_MS, RESPONSE_LENGTH } from '../constants.js';
import { bytesToHex } from '../encoding.js';
import { CommandError, type CommandRunner, execFileRunner } from './command-runner.js';

// ---------------------------------------------------------------------------
// YubiKey HMAC-SHA1 challenge-response via the personalization tools
//
//   ykinfo -s -q                 → serial number
//   ykchalresp -2 -x <hex>       → 40 hex chars (20-byte HMAC)
//
// Slot 2 is expected to hold a 20-byte secret in HMAC mode. If the slot is
// configured to require a touch, ykchalresp blocks until the button is
// pressed or the key's own timeout elapses; our timeout bounds both.
// ---------------------------------------------------------------------------

const NO_DEVICE_RE = /no yubikey present|no device found|failed to find/i;
const RESPONSE_RE = /^[0-9a-f]+$/i;

export interface YubiKeyProviderOptions {
	readonly ykchalrespPath?: string;
	readonly ykinfoPath?: string;
	readonly timeoutMs?: number;
	readonly run?: CommandRunner;
}

export class YubiKeyProvider implements IChallengeResponseProvider {
	readonly name = 'yubikey';
	private readonly logger = new Logger(YubiKeyProvider.name);
	private readonly ykchalresp: string;
	private readonly ykinfo: string;
	private readonly timeoutMs: number;
	private readonly run: CommandRunner;

	constructor(options: YubiKeyProviderOptions = {}) {
		this.ykchalresp = options.ykchalrespPath ?? 'ykchalresp';
		this.ykinfo = options.ykinfoPath ?? 'ykinfo';
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		this.run = options.run ?? execFileRunner;
	}

	async identity(options: ProviderCallOptions = {}): Promise<DeviceIdentity> {
		const { stdout } = await this.exec(this.ykinfo, ['-s', '-q'], options, 'identify');
		const serial = stdout.trim();
		if (!/^\d+$/.test(serial)) {
			throw new ProviderError(`unexpected serial output from ${this.ykinfo}: "${serial}"`, 'identify');
		}
		this.logger.debug(`Detected token ${serial}`);
		return serial;
	}

	async challengeResponse(
		slot: ProviderSlot,
		challenge: Uint8Array,
		options: ProviderCallOptions = {},
	): Promise<Uint8Array> {
		this.logger.debug(`Sending ${challenge.length}-byte challenge to slot ${slot}`);
		const { stdout } = await this.exec(
			this.ykchalresp,
			[`-${slot}`, '-x', bytesToHex(challenge)],
			options,
			'derive',
		);

		const hex = stdout.trim();
		if (hex.length !== RESPONSE_LENGTH * 2 || !RESPONSE_RE.test(hex)) {
			throw new ProviderError(`malformed response from ${this.ykchalresp}`);
		}
		return new Uint8Array(Buffer.from(hex, 'hex'));
	}

	private async exec(
		file: string,
		args: readonly string[],
		options: ProviderCallOptions,
		step: 'identify' | 'derive',
	): Promise<{ stdout: string }> {
		const timeoutMs = options.timeoutMs ?? this.timeoutMs;
		try {
			return await this.run(file, args, { timeoutMs, signal: options.signal });
		} catch (error: unknown) {
			if (!(error instanceof CommandError)) {
				const msg = error instanceof Error ? error.message : String(error);
				throw new ProviderError(`${file} failed: ${msg}`, step);
			}
			switch (error.reason) {
				case 'not-found':
					throw new ProviderUnavailableError(
						`${file} not found; install the YubiKey personalization tools`,
						step,
					);
				case 'timeout':
					throw new ProviderError(`no response from token within ${timeoutMs} ms (touch required?)`, step);
				case 'aborted':
					throw new ProviderError('interrupted while waiting for token', step);
				case 'exit':
					if (NO_DEVICE_RE.test(error.stderr)) {
						throw new ProviderUnavailableError('no hardware token detected', step);
					}
					throw new ProviderError(`${file} failed: ${error.message}`, step);
			}
		}
	}
}
