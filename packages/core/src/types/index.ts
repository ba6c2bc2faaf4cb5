export type { Envelope, SerializedBundle, SerializedEnvelope } from './envelope.js';
export type { DeviceIdentity, DeviceSummary, ProviderSlot } from './device.js';
export type { Failure, Outcome, WorkflowStep } from './outcome.js';
