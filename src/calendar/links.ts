import type { CalendarEvent, MeetingProvider } from './types.js';
import { moduleLogger } from '../observability/logger.js';

const logger = moduleLogger('MeetingLinks');

/**
 * Domains whose links are treated as joinable meetings.
 * Subdomains (e.g. us02web.zoom.us) are accepted too.
 */
export const TRUSTED_MEETING_DOMAINS = [
  'meet.google.com',
  'zoom.us',
  'teams.microsoft.com',
  'webex.com',
  'gotomeeting.com',
  'whereby.com',
  'around.co',
] as const;

const URL_PATTERN = /https?:\/\/[^\s<>"'()[\]{}]+/gi;
const TRAILING_PUNCTUATION = /[.,;:!?]+$/;

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

function isGoogleMeetUrl(url: URL): boolean {
  return url.hostname.toLowerCase() === 'meet.google.com';
}

/**
 * Find distinct Google Meet links in free text
 */
export function extractMeetingLinks(text: string): string[] {
  const found = new Set<string>();

  for (const match of text.matchAll(URL_PATTERN)) {
    const candidate = match[0].replace(TRAILING_PUNCTUATION, '');
    const url = parseUrl(candidate);
    if (url && isGoogleMeetUrl(url)) {
      found.add(url.toString());
    }
  }

  return [...found];
}

/**
 * Whether a link points at a trusted meeting domain over https.
 * Guards against lookalike domains such as zoom.us.example.com.
 */
export function isTrustedMeetingUrl(link: string): boolean {
  const url = parseUrl(link);
  if (!url) {
    logger.debug({ link }, 'Rejected unparseable meeting link');
    return false;
  }

  if (url.protocol !== 'https:') {
    logger.debug({ link }, 'Rejected non-https meeting link');
    return false;
  }

  const host = url.hostname.toLowerCase();
  const trusted = TRUSTED_MEETING_DOMAINS.some(domain => host === domain || host.endsWith(`.${domain}`));
  if (!trusted) {
    logger.debug({ host }, 'Rejected untrusted meeting domain');
  }
  return trusted;
}

export function detectProvider(link: string): MeetingProvider {
  const value = link.toLowerCase();

  if (value.includes('meet.google.com') || value.includes('g.co/meet')) return 'meet';
  if (value.includes('zoom.us') || value.startsWith('zoommtg://')) return 'zoom';
  if (value.includes('teams.microsoft.com') || value.includes('teams.live.com') || value.startsWith('msteams://')) {
    return 'teams';
  }
  if (value.includes('webex.com') || value.startsWith('webex://')) return 'webex';
  return 'generic';
}

/**
 * Pick the link auto-join should open: Google Meet first, then the other
 * video providers, then any trusted link.
 */
export function primaryMeetingLink(event: Pick<CalendarEvent, 'links'>): string | undefined {
  const trusted = event.links.filter(isTrustedMeetingUrl);

  return (
    trusted.find(link => detectProvider(link) === 'meet') ??
    trusted.find(link => {
      const provider = detectProvider(link);
      return provider === 'zoom' || provider === 'teams' || provider === 'webex';
    }) ??
    trusted[0]
  );
}

export function isOnlineMeeting(event: Pick<CalendarEvent, 'links'>): boolean {
  return event.links.some(isTrustedMeetingUrl);
}
