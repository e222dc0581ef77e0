import Anthropic from '@anthropic-ai/sdk';
import type { JournalRecord, MetadataRecord, RationaleGenerator, ScoreReport } from '../types.js';

const MAX_TOKENS = 1024;
const RATIONALE_LABEL = /^\s*Rationale\s*\(HTML\)\s*:\s*/i;

interface MessageContentBlock {
  type: string;
  text?: string;
}

/**
 * The slice of the Anthropic Messages API this generator uses
 */
export interface MessageCreator {
  create(params: {
    model: string;
    max_tokens: number;
    messages: { role: 'user'; content: string }[];
  }): Promise<{ content: MessageContentBlock[] }>;
}

export interface AnthropicRationaleOptions {
  apiKey: string;
  model: string;
  client?: MessageCreator;
  now?: () => Date;
}

function show(value: string | number | boolean | null | undefined): string {
  if (value === null || value === undefined) return 'Unknown';
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';
  return String(value);
}

function journalLines(journal: JournalRecord, label: string): string[] {
  const rate =
    journal.sampledWorksCount && journal.retractedWorksCount !== null
      ? `${((journal.retractedWorksCount / journal.sampledWorksCount) * 100).toFixed(2)}%`
      : 'Unknown';

  return [
    `- ${label}: ${show(journal.title)}`,
    `- ISSN: ${show(journal.issn)}`,
    `- Publisher: ${show(journal.publisher)}`,
    `- Homepage: ${show(journal.homepageUrl)}`,
    `- Country: ${show(journal.countryCode)}`,
    `- In DOAJ: ${show(journal.isInDoaj)}`,
    `- Indexed in Scopus: ${show(journal.isIndexedInScopus)}`,
    `- Open Access: ${show(journal.isOpenAccess)}`,
    `- Works Count: ${show(journal.worksCount)}`,
    `- Cited By Count: ${show(journal.citedByCount)}`,
    `- h-index: ${show(journal.hIndex)}`,
    `- i10-index: ${show(journal.i10Index)}`,
    `- APC (USD): ${show(journal.apcUsd)}`,
    `- Retraction Rate (sampled works): ${rate}`,
    `- Fields of Research: ${journal.fieldsOfResearch?.slice(0, 5).join(', ') || 'Unknown'}`,
    `- Listed as Predatory: ${show(journal.listedAsPredatory)}`,
    `- Listed as Hijacked: ${show(journal.listedAsHijacked)}`,
  ];
}

function recordLines(record: MetadataRecord): string[] {
  if (record.kind === 'journal') {
    return journalLines(record, 'Journal Title');
  }

  const authors = record.authors ?? [];
  const withOrcid = authors.filter((a) => a.hasOrcid).length;
  const lines = [
    `- Title: ${record.title}`,
    `- DOI: ${show(record.doi)}`,
    `- Publication Date: ${show(record.publicationDate ?? record.publicationYear)}`,
    `- Cited By Count: ${show(record.citedByCount)}`,
    `- Referenced Works Count: ${show(record.referencedWorksCount)}`,
    `- Retraction Status: ${show(record.retractionStatus)}`,
    `- Open Access: ${show(record.isOpenAccess)}`,
    `- Language: ${show(record.language)}`,
    `- Authors: ${authors.map((a) => a.name).join(', ') || 'Unknown'}`,
    `- Author ORCID Count: ${record.authors ? `${withOrcid}/${authors.length}` : 'Unknown'}`,
  ];

  if (record.retractionDetails?.retractionNoticeUrl) {
    lines.push(`- Retraction Notice: ${record.retractionDetails.retractionNoticeUrl}`);
  }

  return record.venue
    ? [...lines, ...journalLines(record.venue, 'Published In')]
    : [...lines, `- Published In: ${show(record.publisher)}`];
}

/**
 * Prompt asking the model to explain an already computed score
 */
export function buildRationalePrompt(record: MetadataRecord, report: ScoreReport, now: Date): string {
  const reasons =
    report.reasons.length > 0 ? report.reasons.map((r) => `- ${r}`).join('\n') : '- None';

  return `You are an expert in academic publishing integrity. The current year is ${now.getFullYear()}.
A rule-based scorer has assessed the following ${record.kind}.

**Metadata:**
${recordLines(record).join('\n')}

**Assessment:**
- Credibility Score: ${report.score}/100
- Band: ${report.band}
- Checks evaluated: ${report.evaluatedChecks} of ${report.applicableChecks}
- Triggered reasons:
${reasons}

**Instructions:**
Explain this assessment to a researcher deciding whether to trust or cite this ${record.kind}.
Do not propose a different score or band. Point to specific metadata values that support the
reasons above. Where a check could not be evaluated, say that the data was unavailable.

Respond in this format:
Rationale (HTML): [A short, well-formed HTML block of at most 400 words. Use <p> for paragraphs,
<ul> and <li> for lists, <b> for emphasis and <a> for links to authoritative sources such as
DOAJ, the publisher homepage or a retraction notice. All content must be inside these tags.]`;
}

/**
 * Drop the response label the prompt asks for, if the model repeated it
 */
export function parseRationale(text: string): string {
  return text.replace(RATIONALE_LABEL, '').trim();
}

export class AnthropicRationaleGenerator implements RationaleGenerator {
  private readonly client: MessageCreator;
  private readonly model: string;
  private readonly now: () => Date;

  constructor(options: AnthropicRationaleOptions) {
    this.model = options.model;
    this.now = options.now ?? (() => new Date());
    if (options.client) {
      this.client = options.client;
    } else {
      const anthropic = new Anthropic({ apiKey: options.apiKey });
      this.client = { create: (params) => anthropic.messages.create(params) };
    }
  }

  async generate(record: MetadataRecord, report: ScoreReport): Promise<string> {
    const response = await this.client.create({
      model: this.model,
      max_tokens: MAX_TOKENS,
      messages: [{ role: 'user', content: buildRationalePrompt(record, report, this.now()) }],
    });

    let text = '';
    for (const block of response.content) {
      if (block.type === 'text' && block.text) {
        text += block.text;
      }
    }

    const rationale = parseRationale(text);
    if (!rationale) {
      throw new Error('Empty rationale in model response');
    }
    return rationale;
  }
}
