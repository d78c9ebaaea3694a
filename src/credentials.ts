import { MissingCredentialError } from "./errors.js";

export const TOKEN_ENV_VAR = "GITHUB_TOKEN";

/**
 * Pick the access token: an explicit value wins, otherwise `GITHUB_TOKEN`
 * from `env`. Blank values count as missing.
 */
export function resolveToken(
	token?: string,
	env: NodeJS.ProcessEnv = process.env
): string {
	const value = token?.trim() || env[TOKEN_ENV_VAR]?.trim();
	if (!value) throw new MissingCredentialError(TOKEN_ENV_VAR);
	return value;
}
