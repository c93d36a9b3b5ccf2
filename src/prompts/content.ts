import type { Finding, NextHint, RunState } from '../types/workflow.js';

export const RESEARCHER_SYSTEM = `You are an expert researcher looking for recent news worth a short professional post.
Pick one concrete, newsworthy angle within the given topic and propose web search queries for it.
Prefer angles that differ from the articles listed as already covered.

Respond in JSON format:
["query 1", "query 2"]`;

export function researcherUserPrompt(state: RunState, maxQueries: number, today: string): string {
  const covered = state.rejectedDrafts.map((draft, i) => `[${i + 1}] ${draft.slice(0, 300)}`).join('\n');
  return [
    `Topic: ${state.topic}`,
    `Today: ${today}`,
    `Propose at most ${maxQueries} queries.`,
    covered ? `Already covered (do not repeat these stories):\n${covered}` : '',
  ]
    .filter(Boolean)
    .join('\n\n');
}

export const WRITER_SYSTEM = `You are a professional writer producing a concise post for a professional network.

- Base every claim on the research findings provided; keep dates and numbers exact.
- Write 150-250 words, plain text, no markdown headings.
- End with one question that invites discussion.
- If earlier drafts were rejected as duplicates, cover a clearly different story or angle.`;

function formatFindings(findings: Finding[]): string {
  return findings
    .map((f, i) => {
      const date = f.publishedDate ? ` (${f.publishedDate})` : '';
      return `[${i + 1}] ${f.title}${date}\n    URL: ${f.url}\n    ${f.snippet}`;
    })
    .join('\n\n');
}

export function writerUserPrompt(state: RunState): string {
  const rejected = state.rejectedDrafts.map((draft, i) => `--- Rejected draft ${i + 1} ---\n${draft}`).join('\n\n');
  return [
    `Topic: ${state.topic}`,
    `Research findings:\n${formatFindings(state.researchFindings)}`,
    rejected ? `These drafts duplicated earlier posts and were rejected:\n${rejected}` : '',
  ]
    .filter(Boolean)
    .join('\n\n');
}

export const SUPERVISOR_SYSTEM = `You supervise a content team: researcher, writer, quality checker and publisher.
Choose the next action for the team from the allowed options only.

Respond in JSON format:
{ "next": "<one of the allowed options>" }`;

export function supervisorUserPrompt(state: RunState, legal: readonly NextHint[]): string {
  const recent = state.history
    .slice(-6)
    .map((m) => `${m.node}: ${m.content.slice(0, 200)}`)
    .join('\n');
  return [
    `Allowed options: ${legal.join(', ')}`,
    `Findings: ${state.researchFindings.length}, draft: ${state.draft ? 'yes' : 'no'}, verdict: ${state.qualityVerdict}`,
    `Consecutive duplicate verdicts: ${state.consecutiveDuplicates}`,
    recent ? `Recent messages:\n${recent}` : '',
  ]
    .filter(Boolean)
    .join('\n');
}
