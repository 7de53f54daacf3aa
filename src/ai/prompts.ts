export function buildSearchPrompt(topic: string, pubFrom: string, pubTo: string, seenUrls: string[]): string {
  return `
# ARXIV-ONLY ACADEMIC PAPER DISCOVERY

## Domain Constraints
- Final papers MUST come from arxiv.org
- Google Scholar and Semantic Scholar may only be used to verify citation counts
- Exclude blogs, news articles, dictionaries and commercial websites

## Search Mission
Find the most influential arXiv research papers for:
- **Topic**: ${topic}
- **Publication Window**: ${publicationWindow(pubFrom, pubTo)}

## Ranking
Rank papers by citation impact (40%), community engagement such as social
mentions and GitHub stars (30%), author authority such as h-index (20%) and
recency (10%).

## Verification
- Every paper must have an arXiv identifier
- Publication date must fall within ${publicationWindow(pubFrom, pubTo)}
- Exclude tutorials, surveys and retracted papers
- URLs MUST be different from: ${seenUrls.length > 0 ? seenUrls.join(',') : '(none yet)'}

## Output
For every paper return:
- **url**: direct arXiv PDF link, e.g. https://arxiv.org/pdf/2401.12345v1 (no .pdf extension)
- **title**: paper title
- **publication_date**: YYYY-MM-DD
- **citation_number**: number of citations
- **social_mentions**, **github_stars**, **author_hindex**: when known

Never return abstract pages (https://arxiv.org/abs/...) or non-arXiv domains.
`;
}

function publicationWindow(pubFrom: string, pubTo: string): string {
  return `${pubFrom} to ${pubTo}`;
}

export function buildSearchUserMessage(topic: string, pubFrom: string, pubTo: string, maxResults: number): string {
  return `Topic: **${topic}**. Publication Period: **${publicationWindow(pubFrom, pubTo)}**. Return maximum ${maxResults} papers ranked by impact. You MUST search ONLY pdf papers, not abstract or html pages.`;
}

export function buildSummaryPrompt(level: string, language: string): string {
  return `
You are an expert science communicator creating engaging newsletter content. Analyze this research paper and write a compelling summary.

**AUDIENCE:** ${level} level
**LANGUAGE:** ${language}
**FORMAT:** Single HTML string
**READING TIME:** at most 3 minutes

## Content
- Open with a hook that makes the research relevant to the reader
- Use accessible language without oversimplifying
- Explain why the reader should care
- Mention key figures or tables when they support an important point

## HTML Structure
<div class="paper-summary">
  <header><h1>Paper Title</h1><div class="authors">Author list</div></header>
  <section class="research-context"><h2>The Big Question</h2>...</section>
  <section class="approach"><h2>How They Tackled It</h2>...</section>
  <section class="discoveries"><h2>What They Uncovered</h2>...</section>
  <section class="critical-view"><h2>Putting It In Perspective</h2>...</section>
  <section class="future-impact"><h2>Why This Matters</h2>...</section>
</div>

Use <strong> for emphasis, <em> for technical terms and <blockquote> for striking findings.

Output ONLY the HTML string, no additional text.
`;
}

export function buildNewsletterPrompt(summaryHtml: string): string {
  return `
Shorten the HTML summary of a scientific article below so that only its first 500 characters of text remain, followed by three dots.
Do NOT alter those first 500 characters. Return valid HTML and nothing else.

--- COMPLETE PAPER SUMMARY START ---
${summaryHtml}
--- COMPLETE PAPER SUMMARY END ---
`;
}
