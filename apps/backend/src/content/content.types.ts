export enum ContentType {
  ARTICLE = 'article',
  NEWS = 'news',
  DIALOGUE = 'dialogue',
  EXERCISE = 'exercise',
  CULTURAL = 'cultural',
  AUDIO = 'audio',
  VIDEO = 'video',
}

/**
 * A piece of learning material as handed over by the crawling layer.
 * `language` is free-form; anything other than `english` or `japanese` takes the generic path.
 */
export type Content = {
  readonly contentId: string;
  readonly title: string;
  readonly body: string;
  readonly language: string;
  readonly difficultyLevel?: string;
  readonly contentType: ContentType;
  readonly sourceUrl: string;
  readonly tags: readonly string[];
};

export const analysedText = (content: Pick<Content, 'title' | 'body'>): string =>
  `${content.title} ${content.body}`;
