/**
 * Availability Digest Email Template
 *
 * One e-mail per subscription per cycle listing every admitted window,
 * grouped by club. Windows longer than the subscription's minimum are marked.
 */

import { baseNotificationFooter } from './baseNotificationFooter.js';
import { localDate, localTime, localWeekday, toMillis, weekdayName } from '../../time.js';

export interface DigestEmailWindow {
  sourceId: string;
  sourceName?: string;
  courtId: string;
  courtName?: string;
  start: string;
  end: string;
  durationMinutes: number;
}

export interface DigestTemplateArgs {
  windows: DigestEmailWindow[];
  minSlotDurationMinutes: number;
  timeZone: string;
  applicationName: string;
  manageUrl?: string;
}

const formatDay = (iso: string, timeZone: string): string => {
  const ms = toMillis(iso);
  return `${weekdayName(localWeekday(ms, timeZone))} ${localDate(ms, timeZone)}`;
};

const formatRange = (window: DigestEmailWindow, timeZone: string): string =>
  `${localTime(toMillis(window.start), timeZone)}-${localTime(toMillis(window.end), timeZone)}`;

const formatDuration = (minutes: number): string => {
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  if (hours === 0) return `${rest} min`;
  return rest === 0 ? `${hours} h` : `${hours} h ${rest} min`;
};

function groupBySource(windows: DigestEmailWindow[]): Map<string, DigestEmailWindow[]> {
  const grouped = new Map<string, DigestEmailWindow[]>();
  for (const window of windows) {
    const label = window.sourceName ?? window.sourceId;
    const group = grouped.get(label) ?? [];
    group.push(window);
    grouped.set(label, group);
  }
  return grouped;
}

export function buildAvailabilityDigestEmail(args: DigestTemplateArgs): {
  subject: string;
  text: string;
  html: string;
} {
  const { windows, minSlotDurationMinutes, timeZone, applicationName, manageUrl } = args;
  const count = windows.length;
  const subject = `${count} court slot${count !== 1 ? 's' : ''} just opened up`;
  const grouped = groupBySource(windows);

  const describe = (window: DigestEmailWindow): string => {
    const court = window.courtName ?? window.courtId;
    const marker = window.durationMinutes > minSlotDurationMinutes ? '* ' : '';
    return `${marker}${court}: ${formatDay(window.start, timeZone)}, ${formatRange(window, timeZone)} (${formatDuration(window.durationMinutes)})`;
  };

  // Text version
  const textLines: string[] = [
    `Good news! ${count === 1 ? 'A court matching your alert is' : `${count} courts matching your alert are`} now available.`,
    '',
  ];
  for (const [source, items] of grouped) {
    textLines.push(`${source}:`);
    for (const item of items) {
      textLines.push(`  - ${describe(item)}`);
    }
    textLines.push('');
  }
  if (windows.some((window) => window.durationMinutes > minSlotDurationMinutes)) {
    textLines.push(`* longer than your ${formatDuration(minSlotDurationMinutes)} minimum`);
    textLines.push('');
  }
  textLines.push('Slots go quickly, so book soon.');
  textLines.push('');
  textLines.push(baseNotificationFooter(manageUrl, applicationName));

  const text = textLines.join('\n');

  // HTML version
  let htmlWindows = '';
  for (const [source, items] of grouped) {
    htmlWindows += `
    <h3 style="color: #374151; margin-bottom: 0.5rem; font-size: 1rem;">${escapeHtml(source)}</h3>
    <ul style="margin: 0 0 1rem; padding-left: 1.25rem;">
      ${items
        .map((item) => {
          const extended = item.durationMinutes > minSlotDurationMinutes;
          return `<li style="margin-bottom: 0.5rem;${extended ? ' background: #ecfdf5;' : ''}">
        <strong>${escapeHtml(item.courtName ?? item.courtId)}</strong>
        ${escapeHtml(formatDay(item.start, timeZone))}, ${formatRange(item, timeZone)}
        <span style="color: #6b7280;">(${formatDuration(item.durationMinutes)})</span>
      </li>`;
        })
        .join('')}
    </ul>`;
  }

  const manageLink = manageUrl
    ? `<a href="${escapeHtml(manageUrl)}" style="color: #6b7280;">Manage or pause this alert</a>`
    : '';

  const html = `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif; line-height: 1.5; color: #111827; max-width: 600px; margin: 0 auto; padding: 1rem;">
  <h1 style="margin: 0 0 1rem; color: #1f2937; font-size: 1.25rem;">${escapeHtml(subject)}</h1>
  ${htmlWindows}
  <p style="color: #4b5563;">Slots go quickly, so book soon.</p>
  <hr style="border: none; border-top: 1px solid #e5e7eb; margin: 2rem 0 1rem;">
  <div style="font-size: 0.75rem; color: #9ca3af;">Sent by ${escapeHtml(applicationName)}${manageLink ? ` | ${manageLink}` : ''}</div>
</body>
</html>
  `.trim();

  return { subject, text, html };
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export default buildAvailabilityDigestEmail;
