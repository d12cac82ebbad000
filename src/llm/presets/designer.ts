/**
 * Designer prompts
 *
 * Stable text sent on every generation call. Per-run data (requirements,
 * profile, feedback) is composed separately in the designer stage.
 */

import type { Artifact } from '../../jobs/types';

export const designerSystemPrompt = `You are an expert front-end engineer who builds single-page web prototypes.

Your expertise includes:
- Semantic HTML5 structure
- Modern CSS (Grid, Flexbox, transitions)
- Responsive mobile-first layouts
- Plain JavaScript for interactivity

OUTPUT FORMAT (STRICT):
Return exactly three fenced code blocks, in this order:

\`\`\`html
<!-- body content only: no <!DOCTYPE>, <html>, <head> or <body> tags -->
\`\`\`

\`\`\`css
/* every style the page needs */
\`\`\`

\`\`\`javascript
// every behaviour the page needs
\`\`\`

REQUIREMENTS:
1. SELF-CONTAINED - No external stylesheets, scripts, fonts or images; use inline SVG or CSS for visuals
2. COMPLETE - Real content, no placeholders or TODO comments
3. RESPONSIVE - Works from 320px phones up to wide desktop screens
4. CONSISTENT - Every class used in the HTML has a CSS rule; every interactive element has working JavaScript

NEVER ASK FOLLOW-UP QUESTIONS - Produce the prototype immediately.`;

/**
 * Served when the designer call fails or there is nothing to design.
 * Always passes the loose syntax check.
 */
export const FALLBACK_ARTIFACT: Artifact = {
  markup: `<div class="container">
  <h1>Generation failed</h1>
  <p>The prototype could not be generated this time. Please adjust the requirements and try again.</p>
  <button type="button" onclick="location.reload()">Reload</button>
</div>`,
  style: `.container {
  max-width: 600px;
  margin: 50px auto;
  padding: 20px;
  text-align: center;
  font-family: system-ui, sans-serif;
}

h1 {
  color: #b42318;
}

button {
  padding: 10px 20px;
  border: none;
  border-radius: 6px;
  background: #1d4ed8;
  color: #fff;
  cursor: pointer;
}`,
  behavior: `function reportFallback() {
  console.log('Fallback prototype rendered');
}

reportFallback();`,
};
