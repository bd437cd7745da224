import twitterText from "twitter-text";

export type LengthCounter = (text: string) => number;

export const countByCodePoints: LengthCounter = (text) => Array.from(text).length;

export const countByTwitterRules: LengthCounter = (text) => {
  const parsed = twitterText.parseTweet(text);
  return parsed.weightedLength;
};

const graphemeSegmenter = new Intl.Segmenter(undefined, {
  granularity: "grapheme"
});

export const countByGraphemes: LengthCounter = (text) => {
  let count = 0;
  for (const _segment of graphemeSegmenter.segment(text)) {
    count += 1;
  }
  return count;
};
