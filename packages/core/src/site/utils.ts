/**
 * Site (tenant) to host mapping.
 *
 * Regular sites are suffixes (`beaconhq.com`, `eu.beaconhq.com`) and get
 * `api.` or `app.` prepended. On-call sites are already fully qualified and
 * are used as-is.
 */

/** True for fully-qualified on-call hosts such as `navy.oncall.beaconhq.com` */
export function isOnCallSite(site: string): boolean {
  return site.includes("oncall");
}

/** Host serving the REST API and the OAuth token endpoints */
export function getApiHost(site: string): string {
  return isOnCallSite(site) ? site : `api.${site}`;
}

export function getApiUrl(site: string): string {
  return `https://${getApiHost(site)}`;
}

/** Host serving the browser UI, including the authorization page */
export function getAppHost(site: string): string {
  return isOnCallSite(site) ? site : `app.${site}`;
}

export function getAppUrl(site: string): string {
  return `https://${getAppHost(site)}`;
}
