import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { log } from '../utils/logger';
import { Lead, SupportedPlatform } from './types';

export const BUILT_IN_TEMPLATES: Readonly<Record<string, string>> = {
  default: `Hi {name},

I came across your profile and wanted to reach out. We build AI assistants that answer customer questions around the clock, so your team can focus on the conversations that need a person.

Would you have 15 minutes this week for a quick call?

Best regards,
{sender}`,
  linkedin: `Hi {name},

Your work as {headline} caught my attention. I build AI chat assistants that take over routine customer service and qualify inbound leads, and I think it could be useful for you or your network.

Open to a short chat?

Best,
{sender}`,
  x: `Hi {handle}, saw your post about {topic}. We help teams like yours automate customer replies with AI chat assistants. Happy to show you a demo, DMs are open.

{sender}`,
  cold_email: `Subject: Customer service that never sleeps

Hi {name},

We set up AI chat assistants that:
- reply to customers instantly, day and night
- handle many conversations at once
- connect to WhatsApp, Facebook and Instagram

Interested in a free demo? Just reply to this email.

Best regards,
{sender}`,
};

const PLATFORM_TEMPLATES: Partial<Record<SupportedPlatform, string>> = {
  linkedin: 'linkedin',
  x: 'x',
};

export const templateForPlatform = (lead: Pick<Lead, 'platform'>): string => PLATFORM_TEMPLATES[lead.platform] ?? 'default';

const BLOCK_RULE = '='.repeat(60);

export interface OutreachTemplateOptions {
  sender: string;
}

export class OutreachTemplateEngine {
  private readonly templates = new Map<string, string>(Object.entries(BUILT_IN_TEMPLATES));

  constructor(private readonly options: OutreachTemplateOptions) {}

  register(name: string, text: string): void {
    this.templates.set(name, text);
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  /**
   * Unknown template names fall back to `default`; unknown placeholders render
   * empty. `{name}` and `{handle}` fall back to the lead's identity.
   */
  render(lead: Lead, templateName = 'default'): string {
    const template = this.templates.get(templateName) ?? BUILT_IN_TEMPLATES.default;
    const { attributes } = lead;
    const identity = lead.identity.trim();
    const values: Record<string, string> = {
      identity,
      name: attributes.name || identity || 'there',
      headline: attributes.headline || 'your field',
      handle: attributes.handle || attributes.name || identity || 'there',
      topic: attributes.hashtag || 'business automation',
      sender: this.options.sender,
    };
    return template.replace(/\{(\w+)\}/g, (_, token: string) => values[token] ?? '');
  }

  renderBundle(leads: Lead[], templateFor: (lead: Lead) => string = templateForPlatform): string {
    return leads
      .map((lead) => `\n${BLOCK_RULE}\nTO: ${lead.identity}\nPLATFORM: ${lead.platform}\n${BLOCK_RULE}\n\n${this.render(lead, templateFor(lead))}\n\n`)
      .join('');
  }
}

export const writeOutreachBundle = async (
  destination: string,
  leads: Lead[],
  engine: OutreachTemplateEngine,
  templateFor: (lead: Lead) => string = templateForPlatform,
): Promise<string | null> => {
  if (leads.length === 0) return null;
  await mkdir(path.dirname(destination), { recursive: true });
  await writeFile(destination, engine.renderBundle(leads, templateFor), 'utf8');
  log('INFO', `wrote outreach for ${leads.length} leads`, destination);
  return destination;
};
