/**
 * Plain-text footer shared by alert e-mails
 */

export function baseNotificationFooter(manageUrl?: string, applicationName?: string) {
  const sentBy = applicationName ? `Sent by ${applicationName}` : '';
  const manageLink = manageUrl ? `Manage or pause this alert: ${manageUrl}` : '';
  return ['--', sentBy, manageLink].filter(Boolean).join('\n');
}

export default baseNotificationFooter;
