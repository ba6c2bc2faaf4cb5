export type DeviceIdentity = string;

export type ProviderSlot = 1 | 2;

export interface DeviceSummary {
	readonly deviceIdentity: DeviceIdentity;
	/** Distinct contexts in first-enrolled order. */
	readonly contexts: readonly string[];
	/** Envelope count per context, including older generations. */
	readonly generations: Readonly<Record<string, number>>;
}
