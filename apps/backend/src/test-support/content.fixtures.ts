import { Content, ContentType } from '../content/content.types';

export const buildContent = (overrides: Partial<Content> = {}): Content => ({
  contentId: 'content-1',
  title: '',
  body: '',
  language: 'english',
  contentType: ContentType.ARTICLE,
  sourceUrl: 'https://example.org/lesson',
  tags: [],
  ...overrides,
});

export const beginnerEnglish = buildContent({
  contentId: 'beginner-en',
  title: 'My Day',
  body: 'I am a student. I go to school. My friend is nice. We study together.',
  difficultyLevel: 'CET-4',
});

export const emptyEnglish = buildContent({ contentId: 'empty-en', difficultyLevel: 'CET-4' });

export const beginnerJapanese = buildContent({
  contentId: 'beginner-ja',
  title: 'にちようび',
  body: 'わたしは がくせいです。まいにち がっこうに いきます。ともだちと あそびます。たのしいです。',
  language: 'japanese',
  difficultyLevel: 'N5',
});

export const advancedEnglish = buildContent({
  contentId: 'advanced-en',
  title: 'Research Methodology',
  body:
    'Although the theoretical framework was considered comprehensive, researchers who examined its ' +
    'assumptions argued that it would necessitate substantial revisions. Nevertheless, sophisticated ' +
    'methodologies were developed, which demonstrated considerable analytical precision throughout ' +
    'subsequent investigations.',
  difficultyLevel: 'CET-6',
});
