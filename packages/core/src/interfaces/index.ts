export type {
	IChallengeResponseProvider,
	ProviderCallOptions,
} from './challenge-response-provider.interface.js';
export type { IBundleRepository, IBundleStore } from './bundle-repository.interface.js';
