/**
 * Prompt templates for narration requests
 *
 * The context digest is already bounded by the narrator, so it is copied in
 * whole. Campaign context is rendered separately and only when present.
 */

import type { CampaignContext, ContextDigest, StyleHint } from '@chronicler/core';

import type { ChatMessage } from '../client/types.js';

import { SESSION_NARRATOR_SYSTEM, STYLE_GUIDANCE } from './system-prompts.js';

/**
 * Campaign lines, empty when nothing was supplied
 */
export function formatCampaign(campaign: CampaignContext | undefined): string {
  if (!campaign) return '';

  const lines: string[] = [];
  if (campaign.sessionName) lines.push(`Session: ${campaign.sessionName}`);
  if (campaign.setting) lines.push(`Setting: ${campaign.setting}`);
  if (campaign.party && campaign.party.length > 0) lines.push(`Party: ${campaign.party.join(', ')}`);
  if (campaign.previousEvents && campaign.previousEvents.length > 0) {
    lines.push(`Earlier sessions: ${campaign.previousEvents.join(' ')}`);
  }
  if (campaign.campaignNotes) lines.push(`Notes: ${campaign.campaignNotes}`);
  return lines.join('\n');
}

/**
 * User prompt for one segment
 */
export function buildNarrationPrompt(segmentText: string, context: ContextDigest, style: StyleHint): string {
  const sections: string[] = [
    `PART ${context.segmentIndex + 1} OF ${context.totalSegments}`,
    STYLE_GUIDANCE[style],
  ];

  const campaign = formatCampaign(context.campaign);
  if (campaign) {
    sections.push(`CAMPAIGN:\n${campaign}`);
  }

  if (context.text) {
    sections.push(`CONTEXT SO FAR:\n${context.text}`);
  }

  sections.push(`TRANSCRIPT:\n${segmentText}`);
  sections.push('Write the narrative for this part now.');

  return sections.join('\n\n');
}

/**
 * System and user messages for one segment
 */
export function buildNarrationMessages(
  segmentText: string,
  context: ContextDigest,
  style: StyleHint,
): ChatMessage[] {
  return [
    { role: 'system', content: SESSION_NARRATOR_SYSTEM },
    { role: 'user', content: buildNarrationPrompt(segmentText, context, style) },
  ];
}
