export {
	AuthenticationFailedError,
	CancelledError,
	InvalidInputError,
	NotFoundError,
	PersistenceError,
	ProviderError,
	ProviderUnavailableError,
	SealError,
} from './seal-error.js';
