export type CorpusName = 'webpages' | 'webpages2';

export const CORPORA: readonly CorpusName[] = ['webpages', 'webpages2'];

export interface SavedPage {
  title: string;
  text: string;
  name: string;
  corpus: CorpusName;
}

export type OverviewSource = 'ai' | 'heuristic';

export interface Overview {
  text: string;
  source: OverviewSource;
}

export interface Citation {
  index: number;
  title: string;
  href: string;
}

export function isCorpusName(value: string | null | undefined): value is CorpusName {
  return CORPORA.some(corpus => corpus === value);
}
