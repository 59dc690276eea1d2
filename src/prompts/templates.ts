import { FusedContext, Intent, ScoredEvidence } from '../types';

const MAX_SCORED_CONTENT = 500;

export const PROMPT_TEMPLATES = {
  CLASSIFY: (query: string, previousIntents: Intent[] = []) => {
    const history = previousIntents.length > 0
      ? `Earlier intents in this conversation (most recent last): ${previousIntents.join(', ')}\n\n`
      : '';
    return `${history}Classify this query:\n\n${query}`;
  },

  SCORE: (query: string, content: string) =>
    `Query: ${query}\n\nEvidence: ${content.substring(0, MAX_SCORED_CONTENT)}`,

  ANSWER: (query: string, context: FusedContext) => {
    const facts = context.evidence
      .filter((item): item is Extract<ScoredEvidence, { provenance: 'graph' }> => item.provenance === 'graph')
      .map(item => `- ${item.fact.sentence}`);

    const documents = context.evidence
      .filter((item): item is Extract<ScoredEvidence, { provenance: 'document' }> => item.provenance === 'document')
      .map(item => {
        const title = item.chunk.documentTitle ? ` (${item.chunk.documentTitle})` : '';
        return `[${item.citation}]${title} ${item.chunk.text}`;
      });

    let prompt = `Query intent: ${context.intent.intent}\n\n`;
    prompt += `GRAPH FACTS:\n${facts.length > 0 ? facts.join('\n') : '(none)'}\n\n`;
    prompt += `DOCUMENTS:\n${documents.length > 0 ? documents.join('\n\n') : '(none)'}\n\n`;

    if (context.noEvidence) {
      prompt += 'No evidence was retrieved. Say that the knowledge base has no information on this.\n\n';
    }

    prompt += `Question: ${query}`;
    return prompt;
  },
};
