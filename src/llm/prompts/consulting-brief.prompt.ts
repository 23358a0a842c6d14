import { ConsultingBriefInput } from '../interfaces/llm.interface';

export const CONSULTING_BRIEF_SYSTEM_PROMPT =
  'You are a senior finance transformation consultant. ' +
  'Write concise, high-quality consulting briefs for CFOs and finance leaders. ' +
  'Keep the tone practical and structured, and organize the output under numbered headings.';

const BRIEF_SECTIONS = [
  `1. Context & Problem Restatement
   - Restate the situation in plain language (2-3 bullets).
   - Explain why it hurts Finance and the business.`,
  `2. Likely Root Causes
   - 4-6 bullets across Process, Technology, Data, Organization and Governance.`,
  `3. Quick Wins (0-3 months)
   - 4-6 concrete actions, each starting with a strong verb.`,
  `4. Roadmap 3-6 months
   - 3-5 medium-term initiatives (process, tech, operating model).`,
  `5. Roadmap 6-12 months
   - 3-5 structural changes.`,
  `6. Risks & Dependencies
   - 4-6 bullets on execution risk, data/tech dependencies and change management.`,
  `7. Success Metrics / KPIs
   - 6-8 metrics a CFO would track (cycle time, close quality, automation %, IC breaks).`,
];

export function buildConsultingBriefPrompt(input: ConsultingBriefInput): string {
  return `You are helping a CFO diagnose and solve a **${input.domain}** challenge.

### Original problem (verbatim from client)
"""${input.problem.trim()}"""

### Rule-based summary from the internal diagnostic engine
${input.ruleBasedSummary.trim()}

### Task
Write a one-page consulting brief in markdown with this structure:

# Consulting Brief: short, impactful title (one line)

${BRIEF_SECTIONS.join('\n\n')}

Make it specific to the problem and domain. Do not add sections outside 1-7.`;
}
