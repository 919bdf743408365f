/**
* A GA4 property as reported by the Admin API
*/
export interface AccessibleProperty {
  id: string;
  resourceName: string;
  displayName: string;
  accountId: string;
  accountName?: string | undefined;
  propertyType?: string | undefined;
}

/**
* Port for GA4 property discovery.
*
* Implementations flatten every account the credentials can see into one list.
*
* @throws {ExternalApiError} AUTH_ERROR, NETWORK_ERROR or TIMEOUT_ERROR
*/
export interface AdminApiClient {
  /**
  * List every property accessible to the configured credentials
  *
  * @param signal - Aborted when the caller gives up on the call
  */
  listAccessibleProperties(signal?: AbortSignal): Promise<AccessibleProperty[]>;
}
