// ---------------------------------------------------------------------------
// Status Service Token Manager
// Supplies the service credential used by the status service client
// ---------------------------------------------------------------------------

/**
 * Returns a static, long-lived service token.
 *
 * The token is provided via environment variable and represents a durable
 * service credential for unattended service-to-service calls.
 */
export class StatusTokenManager {
	private readonly serviceToken: string;

	constructor(serviceToken: string) {
		if (!serviceToken) {
			throw new Error("Service token is required");
		}
		this.serviceToken = serviceToken;
	}

	async getToken(): Promise<string> {
		return this.serviceToken;
	}
}

let tokenManagerInstance: StatusTokenManager | null = null;

/**
 * Get the singleton token manager instance.
 * Requires the STATUS_SERVICE_TOKEN environment variable.
 */
export function getTokenManager(): StatusTokenManager {
	if (!tokenManagerInstance) {
		const serviceToken = process.env.STATUS_SERVICE_TOKEN;
		if (!serviceToken) {
			throw new Error(
				"STATUS_SERVICE_TOKEN environment variable is required for status service authentication",
			);
		}
		tokenManagerInstance = new StatusTokenManager(serviceToken);
	}
	return tokenManagerInstance;
}

/** Reset the singleton instance (for testing). */
export function resetTokenManager(): void {
	tokenManagerInstance = null;
}
