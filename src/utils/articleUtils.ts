import { formatDistance, isValid, parseISO } from 'date-fns';

/** First ten characters of the timestamp, the `yyyy-MM-dd` part of an ISO value. */
export const formatPublishedDate = (publishedAt: string): string => publishedAt.slice(0, 10);

export const formatPublishedRelative = (publishedAt: string, now: Date = new Date()): string => {
  const parsed = parseISO(publishedAt.trim());
  if (!isValid(parsed)) return '';
  return formatDistance(parsed, now, { addSuffix: true });
};
