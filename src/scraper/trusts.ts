/**
 * Trust Registry
 *
 * Homepages crawled by the scraper, with the short code and display name
 * written into every event record. The homepage URL doubles as the crawl
 * boundary: only links starting with it are followed.
 */

import type { TrustSite } from './types.js';

export const TRUST_SITES: readonly TrustSite[] = [
  { url: 'https://www.groundworkatlanta.org/', abbrev: 'ATL', name: 'Atlanta' },
  { url: 'https://www.groundworkbridgeport.org/', abbrev: 'BPRT', name: 'Bridgeport' },
  { url: 'https://gwbuffalo.org/', abbrev: 'BUF', name: 'Buffalo' },
  { url: 'https://groundworkcolorado.org/', abbrev: 'DCO', name: 'Denver' },
  { url: 'https://groundworkelizabeth.org/', abbrev: 'ENJ', name: 'Elizabeth' },
  { url: 'https://www.groundworkerie.org/', abbrev: 'ERI', name: 'Erie' },
  { url: 'https://www.groundworkhv.org/', abbrev: 'HV', name: 'Hudson Valley' },
  { url: 'https://www.groundworkindy.org/', abbrev: 'IND', name: 'Indy' },
  { url: 'https://www.groundworkjacksonville.org/', abbrev: 'JAX', name: 'Jacksonville' },
  { url: 'https://groundworklawrence.org/', abbrev: 'LMA', name: 'Lawrence' },
  { url: 'https://www.groundworkmke.org/', abbrev: 'MKE', name: 'Milwaukee' },
  { url: 'https://www.groundworkmobile.org/', abbrev: 'MOB', name: 'Mobile' },
  { url: 'https://groundwork-neworleans.org/', abbrev: 'NOLA', name: 'New Orleans' },
  { url: 'https://www.northeastkck.org/', abbrev: 'NRG', name: 'Northeast Revitalization Group' },
  { url: 'https://www.groundworkorv.org/', abbrev: 'ORV', name: 'Ohio River Valley' },
  { url: 'https://groundworkri.org/', abbrev: 'RI', name: 'Rhode Island' },
  { url: 'https://www.groundworkrichmond.org/', abbrev: 'RCA', name: 'Richmond' },
  { url: 'https://www.groundworkrva.org/', abbrev: 'RVA', name: 'RVA' },
  { url: 'https://groundworksandiego.org/', abbrev: 'SD', name: 'San Diego' },
  { url: 'https://groundworksomerville.org/', abbrev: 'SOM', name: 'Somerville' },
  { url: 'https://groundworksouthcoast.org/', abbrev: 'SC', name: 'Southcoast' },
];

/**
 * Resolves a homepage URL to its registry entry. Sites outside the registry
 * (e.g. passed via SCRAPER_SITES) are labelled UNK / Unknown.
 */
export function lookupTrust(url: string): TrustSite {
  const trimmed = url.trim();
  return TRUST_SITES.find(t => t.url === trimmed) ?? { url: trimmed, abbrev: 'UNK', name: 'Unknown' };
}
