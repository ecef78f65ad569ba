import type { AnonymizedResponse, RawRanking, Stage1Result } from '../council/stage-results.js';
import type { RankingSummary } from './deliberation.js';
import { anonymizeResponses, formatLabel } from './anonymize.js';

export function buildRankingPrompt(question: string, responses: readonly AnonymizedResponse[]): string {
  const responsesText = responses
    .map((r) => `${formatLabel(r.label)}:\n${r.content}`)
    .join('\n\n');

  return `You are evaluating different responses to the following question:

Question: ${question}

Here are the responses from different models (anonymized):

${responsesText}

Your task:
1. First, evaluate each response individually. For each response, explain what it does well and what it does poorly.
2. Then, at the very end of your response, provide a final ranking.

IMPORTANT: Your final ranking MUST be formatted EXACTLY as follows:
- Start with the line "FINAL RANKING:" (all caps, with colon)
- Then list the responses from best to worst as a numbered list
- Each line should be: number, period, space, then ONLY the response label (e.g., "1. Response A")
- Do not add any other text or explanations in the ranking section

Example of the correct format for the end of your response:

FINAL RANKING:
1. Response C
2. Response A
3. Response B

Now provide your evaluation and ranking:`;
}

function describeAggregates(summary: RankingSummary): string {
  if (summary.aggregateRankings.length === 0) return '(no usable rankings)';
  return summary.aggregateRankings
    .map((r, i) => `${i + 1}. ${r.model} (${formatLabel(r.label)}): average position ${r.averageRank} across ${r.rankingsCount} ranking(s)`)
    .join('\n');
}

function describeTournament(summary: RankingSummary): string {
  if (summary.tournamentRankings.length === 0) return '(no usable rankings)';
  return summary.tournamentRankings
    .map((r, i) => `${i + 1}. ${r.model} (${formatLabel(r.label)}): ${r.wins} win(s), ${r.losses} loss(es), ${r.ties} tie(s)`)
    .join('\n');
}

/**
 * The chairman sees who wrote what. Identities are hidden only from the
 * reviewers in Stage 2.
 */
export function buildSynthesisPrompt(
  question: string,
  stage1: readonly Stage1Result[],
  stage2: readonly RawRanking[],
  summary: RankingSummary,
): string {
  const stage1Text = stage1.length > 0
    ? anonymizeResponses(stage1).responses
        .map((r) => `${formatLabel(r.label)}, written by ${r.model}:\n${r.content}`)
        .join('\n\n')
    : '(No council member produced an answer.)';

  const stage2Text = stage2.length > 0
    ? stage2.map((r) => `Reviewer ${r.model}:\n${r.rankingText}`).join('\n\n')
    : '(No peer evaluations are available.)';

  return `You are the Chairman of an LLM Council. Multiple AI models have answered a user's question independently, and then ranked each other's answers without knowing who wrote which.

Original Question: ${question}

STAGE 1 - Individual Responses:
${stage1Text}

STAGE 2 - Peer Evaluations:
${stage2Text}

STAGE 2 - Aggregate Ranking (mean position, lower is better):
${describeAggregates(summary)}

STAGE 2 - Tournament Ranking (head-to-head matchups):
${describeTournament(summary)}

Your task as Chairman is to synthesize all of this information into a single, comprehensive, accurate answer to the user's original question. Consider:
- The individual responses and their insights
- The peer evaluations and what both rankings reveal about response quality
- Any patterns of agreement or disagreement

Provide a clear, well-reasoned final answer that represents the council's collective wisdom:`;
}

export const CHAIRMAN_DIRECT_SYSTEM_PROMPT =
  'You are the Chairman of an LLM Council. The council has already deliberated earlier in this conversation. ' +
  'Answer the follow-up directly and concisely, staying consistent with the conclusions reached so far.';

export function buildSummaryPrompt(conversationText: string): string {
  return `Summarize the following conversation concisely in 2-3 sentences. Focus on key topics, questions asked, and important context that would be needed to understand follow-up questions.

Conversation:
${conversationText}

Concise summary:`;
}

export function buildTitlePrompt(question: string): string {
  return `Generate a very short title (3-5 words maximum) that summarizes the following question.
The title should be concise and descriptive. Do not use quotes or punctuation in the title.

Question: ${question}

Title:`;
}
