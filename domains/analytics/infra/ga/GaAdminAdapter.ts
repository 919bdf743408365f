import { google } from 'googleapis';
import type { analyticsadmin_v1beta } from 'googleapis';

import { getLogger } from '@kernel/logger';

import type { AccessibleProperty, AdminApiClient } from '../../application/ports/AdminApiClient';
import { throwIfAborted, toExternalApiError } from './googleErrors';

const logger = getLogger('GaAdminAdapter');

export const ANALYTICS_READONLY_SCOPE = 'https://www.googleapis.com/auth/analytics.readonly';

/** Account summaries per page; the API caps this at 200 */
const PAGE_SIZE = 200;
/** Upper bound on pages followed in one discovery */
const MAX_PAGES = 50;

export interface GaAdminAdapterOptions {
  /** Path to the service account JSON key file */
  keyFilename: string;
  /** Per-request timeout passed to the HTTP client */
  timeoutMs: number;
}

function lastSegment(resourceName: string | null | undefined): string {
  if (!resourceName) return '';
  const parts = resourceName.split('/');
  return parts[parts.length - 1] ?? '';
}

/**
* Flatten one page of account summaries into properties
*/
export function flattenAccountSummaries(
  summaries: readonly analyticsadmin_v1beta.Schema$GoogleAnalyticsAdminV1betaAccountSummary[]
): AccessibleProperty[] {
  const properties: AccessibleProperty[] = [];

  for (const account of summaries) {
  const accountId = lastSegment(account.account);
  for (const summary of account.propertySummaries ?? []) {
    const id = lastSegment(summary.property);
    if (!id) continue;
    properties.push({
    id,
    resourceName: summary.property ?? `properties/${id}`,
    displayName: summary.displayName ?? '',
    accountId,
    accountName: account.displayName ?? undefined,
    propertyType: summary.propertyType ?? undefined,
    });
  }
  }

  return properties;
}

/**
* Google Analytics Admin API Adapter
*
* Discovers properties through account summaries, which list every account
* and property the service account can read in one paginated call.
*/
export class GaAdminAdapter implements AdminApiClient {
  private readonly admin: analyticsadmin_v1beta.Analyticsadmin;
  private readonly timeoutMs: number;

  constructor(options: GaAdminAdapterOptions) {
  const auth = new google.auth.GoogleAuth({
    keyFile: options.keyFilename,
    scopes: [ANALYTICS_READONLY_SCOPE],
  });
  this.admin = google.analyticsadmin({ version: 'v1beta', auth });
  this.timeoutMs = options.timeoutMs;
  }

  async listAccessibleProperties(signal?: AbortSignal): Promise<AccessibleProperty[]> {
  const properties: AccessibleProperty[] = [];
  let pageToken: string | undefined;
  let pages = 0;

  try {
    do {
    throwIfAborted(signal, 'Listing account summaries');
    const response = await this.admin.accountSummaries.list(
      { pageSize: PAGE_SIZE, ...(pageToken ? { pageToken } : {}) },
      { timeout: this.timeoutMs, ...(signal ? { signal } : {}) }
    );
    properties.push(...flattenAccountSummaries(response.data.accountSummaries ?? []));
    pageToken = response.data.nextPageToken || undefined;
    pages++;
    } while (pageToken && pages < MAX_PAGES);
  } catch (error) {
    throw toExternalApiError(error, 'Listing GA4 account summaries');
  }

  if (pageToken) {
    logger.warn('Stopped following account summary pages', { pages, properties: properties.length });
  }
  return properties;
  }
}
