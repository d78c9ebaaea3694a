export class RepoMinerError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** No access token was supplied and none is set in the environment. */
export class MissingCredentialError extends RepoMinerError {
	constructor(readonly variable: string) {
		super(`Missing ${variable} in environment`);
	}
}

/**
 * Any failure coming from the remote API: transport errors, auth failures,
 * unknown repositories, exhausted rate limits.
 */
export class UpstreamError extends RepoMinerError {
	constructor(
		message: string,
		readonly status?: number,
		options?: { cause?: unknown }
	) {
		super(message, options);
	}
}

export class InvalidInputError extends RepoMinerError {}
