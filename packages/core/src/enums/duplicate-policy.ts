/** What insertion does when the device already holds the context. */
export enum DuplicatePolicy {
	APPEND = 'append',
	REPLACE = 'replace',
	REJECT = 'reject',
}
