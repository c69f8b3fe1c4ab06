import { buildUrl, fetchWithRetries } from './http.js';
import { errorMessage, type Logger } from './log.js';
import type { EmailMessage, Mailer, ServiceConfig, ShortlistDaycare } from './types.js';

export type SendGridConfig = Pick<ServiceConfig, 'sendgridApiKey' | 'sendgridBaseUrl' | 'fromEmail' | 'requestTimeoutMs'>;

export const SHORTLIST_SUBJECT = 'Your Find My Daycare Shortlist';
const SENDER_NAME = 'Find My Daycare';
const SITE_URL = 'https://findmydaycare.com';
const RULE = '='.repeat(40);

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function badgesFor(daycare: ShortlistDaycare): string[] {
  const badges: string[] = [];
  if (daycare.cwelcc) {
    badges.push('CWELCC');
  }
  if (daycare.subsidy) {
    badges.push('Subsidy');
  }
  return badges;
}

function summaryLine(daycares: ShortlistDaycare[], searchAddress: string): string {
  return `${daycares.length} daycares near ${searchAddress}`;
}

export function buildShortlistText(daycares: ShortlistDaycare[], searchAddress: string): string {
  const lines = ['Your Daycare Shortlist', summaryLine(daycares, searchAddress), '', RULE, ''];

  for (const daycare of daycares) {
    lines.push(daycare.name || 'Unknown');
    lines.push(`  ${daycare.address ?? ''}, ${daycare.postalCode ?? ''}`);
    lines.push(`  ${daycare.distanceKm ?? ''} km away`);

    if (daycare.phone) {
      lines.push(`  Phone: ${daycare.phone}`);
    }
    if (daycare.website) {
      lines.push(`  Website: ${daycare.website}`);
    }
    if (daycare.googleRating) {
      const reviews = daycare.googleReviewsCount ? ` (${daycare.googleReviewsCount} reviews)` : '';
      lines.push(`  Rating: ${daycare.googleRating}${reviews}`);
    }

    const badges = badgesFor(daycare);
    if (badges.length > 0) {
      lines.push(`  ${badges.join(', ')}`);
    }
    lines.push('');
  }

  lines.push(RULE);
  lines.push(`Sent from ${SENDER_NAME}`);
  return lines.join('\n');
}

const BADGE_STYLES: Record<string, string> = {
  CWELCC: 'background:#e8f4f8;color:#2e7d9a;',
  Subsidy: 'background:#e6f4f1;color:#0f7b6c;'
};

function daycareRowHtml(daycare: ShortlistDaycare): string {
  const parts: string[] = [
    `<h3 style="margin:0 0 8px 0;color:#37352f;font-size:18px;">${escapeHtml(daycare.name || 'Unknown')}</h3>`,
    `<p style="margin:4px 0;color:#6b6b6b;font-size:14px;">${escapeHtml(daycare.address ?? '')}, ${escapeHtml(daycare.postalCode ?? '')}</p>`,
    `<p style="margin:4px 0;color:#0f7b6c;font-weight:600;font-size:14px;">${escapeHtml(String(daycare.distanceKm ?? ''))} km away</p>`
  ];

  if (daycare.googleRating) {
    const reviews = daycare.googleReviewsCount
      ? ` <span style="color:#6b6b6b;">(${daycare.googleReviewsCount} reviews)</span>`
      : '';
    parts.push(`<p style="margin:4px 0;color:#f59e0b;font-size:14px;">&#9733; ${daycare.googleRating}${reviews}</p>`);
  }
  if (daycare.phone) {
    const phone = escapeHtml(daycare.phone);
    parts.push(`<p style="margin:4px 0;"><a href="tel:${phone}" style="color:#37352f;text-decoration:none;">${phone}</a></p>`);
  }
  if (daycare.website) {
    parts.push(
      `<p style="margin:4px 0;"><a href="${escapeHtml(daycare.website)}" style="color:#2563eb;text-decoration:none;">Visit Website</a></p>`
    );
  }

  const badges = badgesFor(daycare)
    .map(
      (badge) =>
        `<span style="${BADGE_STYLES[badge]}padding:4px 8px;border-radius:4px;font-size:12px;margin-right:4px;">${badge}</span>`
    )
    .join('');
  parts.push(`<p style="margin:8px 0 0 0;">${badges}</p>`);

  return `<tr><td style="padding:20px;border-bottom:1px solid #e8e5e0;">${parts.join('')}</td></tr>`;
}

export function buildShortlistHtml(daycares: ShortlistDaycare[], searchAddress: string): string {
  const rows = daycares.map(daycareRowHtml).join('\n');
  return `<!DOCTYPE html>
<html>
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
</head>
<body style="margin:0;padding:0;background-color:#faf9f7;font-family:-apple-system,BlinkMacSystemFont,'Segoe UI',Roboto,'Helvetica Neue',sans-serif;">
<table width="100%" cellpadding="0" cellspacing="0" style="background-color:#faf9f7;padding:40px 20px;">
<tr><td align="center">
<table width="600" cellpadding="0" cellspacing="0" style="background-color:#ffffff;border-radius:12px;">
<tr><td style="padding:32px;text-align:center;border-bottom:1px solid #e8e5e0;">
<h1 style="margin:0;color:#37352f;font-size:24px;">Your Daycare Shortlist</h1>
<p style="margin:12px 0 0 0;color:#6b6b6b;font-size:14px;">${escapeHtml(summaryLine(daycares, searchAddress))}</p>
</td></tr>
${rows}
<tr><td style="padding:24px;text-align:center;background-color:#f5f3f0;border-radius:0 0 12px 12px;">
<p style="margin:0;color:#6b6b6b;font-size:13px;">Sent from <a href="${SITE_URL}" style="color:#2e7d9a;text-decoration:none;">${SENDER_NAME}</a></p>
</td></tr>
</table>
</td></tr>
</table>
</body>
</html>`;
}

export function buildShortlistEmail(to: string, daycares: ShortlistDaycare[], searchAddress: string): EmailMessage {
  return {
    to,
    subject: SHORTLIST_SUBJECT,
    text: buildShortlistText(daycares, searchAddress),
    html: buildShortlistHtml(daycares, searchAddress)
  };
}

/** Delivers mail through SendGrid's v3 `mail/send` endpoint. */
export class SendGridMailer implements Mailer {
  private readonly config: SendGridConfig;
  private readonly log: Logger;

  constructor(config: SendGridConfig, log: Logger) {
    this.config = config;
    this.log = log;
  }

  async send(message: EmailMessage): Promise<boolean> {
    if (!this.config.sendgridApiKey) {
      this.log.error('SENDGRID_API_KEY not configured');
      return false;
    }

    const payload = {
      personalizations: [{ to: [{ email: message.to }] }],
      from: { email: this.config.fromEmail, name: SENDER_NAME },
      subject: message.subject,
      content: [
        { type: 'text/plain', value: message.text },
        { type: 'text/html', value: message.html }
      ]
    };

    try {
      await fetchWithRetries(
        {
          service: 'sendgrid',
          url: buildUrl(this.config.sendgridBaseUrl, '/v3/mail/send'),
          timeoutMs: this.config.requestTimeoutMs,
          maxAttempts: 1,
          init: {
            method: 'POST',
            headers: {
              Authorization: `Bearer ${this.config.sendgridApiKey}`,
              'Content-Type': 'application/json'
            },
            body: JSON.stringify(payload)
          }
        },
        this.log
      );
      return true;
    } catch (error) {
      this.log.error('SendGrid delivery failed', { error: errorMessage(error) });
      return false;
    }
  }
}
