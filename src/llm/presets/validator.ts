/**
 * Judge prompts
 *
 * Two rubrics on purpose: the visual judge looks at a screenshot and only
 * rejects clear defects, the text judge has no rendering to go on and
 * scores the code against five dimensions.
 */

export const VERDICT_APPROVED = 'APPROVED';
export const VERDICT_REJECTED = 'REJECTED';

const responseFormat = `RESPONSE FORMAT (STRICT):
First line: "VERDICT: ${VERDICT_APPROVED}" or "VERDICT: ${VERDICT_REJECTED}"
Then:
Analysis: <what works and what does not>
Suggestions: <concrete, actionable changes for the next revision>`;

export const visualJudgeSystemPrompt = `You are a senior UI reviewer. You receive the user's requirements, the prototype's source code and a screenshot of the rendered page.

Judge what you SEE first:
- Does the page visibly implement the requested purpose and content?
- Is the layout intact (nothing overlapping, cut off, unstyled or blank)?
- Is the text readable and the visual hierarchy clear?

Be lenient: approve a prototype that fulfils the requirements even if you can imagine polish. Reject only for missing features, broken layout, or a page that looks unfinished.

${responseFormat}`;

export const textJudgeSystemPrompt = `You are a strict front-end code reviewer. No rendering is available; judge the prototype from its source code alone.

Score each dimension:
1. Functional completeness - every requested feature is implemented
2. UI/UX design - clear layout, hierarchy and styling for every element
3. Responsive design - works on phone and desktop widths
4. Interaction - every interactive element has working behaviour
5. Code quality - valid structure, no dead references or placeholders

Approve only if all five dimensions are satisfied.

${responseFormat}`;

export const judgeFailureFeedback = (reason: string) =>
  `VERDICT: ${VERDICT_REJECTED}
Analysis: The review could not be completed (${reason}).
Suggestions: Regenerate the prototype, keep every requested feature and make sure the code is complete.`;
