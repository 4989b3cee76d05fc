import natural from 'natural';

/** Returns candidate noun phrases found in a text. */
export type PhraseExtractor = (text: string) => string[];

const ADJECTIVE_TAGS = new Set(['JJ', 'JJR', 'JJS']);
const NOUN_TAGS = new Set(['NN', 'NNS', 'NNP', 'NNPS']);
const MIN_PHRASE_WORDS = 2;
// tokens without a letter or digit end a phrase
const PUNCTUATION = /^[^\p{L}\p{N}]+$/u;

interface TaggedToken {
  token: string;
  tag: string;
}

type Tagger = InstanceType<typeof natural.BrillPOSTagger>;
type Tokenizer = InstanceType<typeof natural.WordPunctTokenizer>;

let tagger: Tagger | null = null;
let tokenizer: Tokenizer | null = null;

const getTagger = (): Tagger => {
  if (!tagger) {
    // Unknown words default to nouns so tickers and slang still chunk
    const lexicon = new natural.Lexicon('EN', 'NN', 'NNP');
    const ruleSet = new natural.RuleSet('EN');
    tagger = new natural.BrillPOSTagger(lexicon, ruleSet);
  }
  return tagger;
};

const getTokenizer = (): Tokenizer => {
  if (!tokenizer) {
    tokenizer = new natural.WordPunctTokenizer();
  }
  return tokenizer;
};

const closeRun = (run: TaggedToken[], phrases: string[]): void => {
  // a phrase ends on its last noun
  let end = run.length;
  while (end > 0 && !NOUN_TAGS.has(run[end - 1].tag)) end--;

  if (end >= MIN_PHRASE_WORDS) {
    phrases.push(run.slice(0, end).map((t) => t.token.toLowerCase()).join(' '));
  }
};

/**
 * Chunks maximal adjective/noun runs that end in a noun, e.g.
 * "the volatile stock market rallied" -> ["volatile stock market"].
 * Punctuation closes a run, so phrases never span a comma or sentence end.
 */
export const extractNounPhrases: PhraseExtractor = (text) => {
  const tokens = getTokenizer().tokenize(text);
  if (tokens.length === 0) return [];

  const tagged: TaggedToken[] = getTagger().tag(tokens).taggedWords;
  const phrases: string[] = [];
  let run: TaggedToken[] = [];

  for (const word of tagged) {
    if (!PUNCTUATION.test(word.token) && (ADJECTIVE_TAGS.has(word.tag) || NOUN_TAGS.has(word.tag))) {
      run.push(word);
      continue;
    }
    closeRun(run, phrases);
    run = [];
  }
  closeRun(run, phrases);

  return phrases;
};
