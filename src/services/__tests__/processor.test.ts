import { cleanText, isAcceptable, parseStory, processStories, toUnixSeconds } from '../processor.js';

const story = {
  id: 'a1b2',
  headline: 'Flood &amp; rain',
  subheadline: 'Rivers rising',
  summary: '   ',
  'author-name': 'Staff Reporter',
  authors: [{ name: 'Rahim' }, { name: 'Karim' }, {}],
  url: 'https://news.example.com/a1b2',
  'read-time': '4',
  'word-count': 120,
  seo: { 'meta-description': 'Floods hit the north', 'meta-keywords': ['flood', 'rain'] },
  tags: [{ name: 'weather' }, { name: null }],
  sections: [{ name: 'Bangladesh' }],
  'published-at': 1609459200123,
  'created-at': '1609459100999',
  cards: [
    {
      'story-elements': [
        { type: 'text', text: '<p>First&nbsp;para.</p><p>Second <b>bold</b>.</p>' },
        { type: 'image', text: 'not included' },
      ],
    },
    { 'story-elements': [{ type: 'text', text: 'Third' }] },
  ],
};

describe('cleanText', () => {
  it('strips tags and comments and decodes numeric entities', () => {
    expect(cleanText('<!-- note -->a&#2453;b&#x41;<i>c</i>')).toBe('aকbAc');
  });

  it('decodes named entities instead of dropping them', () => {
    expect(cleanText('It&rsquo;s 5&ndash;7 &mdash; done&hellip; &copy; caf&eacute;')).toBe(
      'It\u2019s 5\u20137 \u2014 done\u2026 \u00a9 caf\u00e9'
    );
    expect(cleanText('ঢাকা&nbsp;&lsquo;বৃষ্টি&rsquo;')).toBe('ঢাকা \u2018বৃষ্টি\u2019');
  });

  it('keeps text that only looks like an entity', () => {
    expect(cleanText('AT&T &unknown; 3 < 4')).toBe('AT&T &unknown; 3 < 4');
  });

  it('keeps paragraphs apart and collapses whitespace', () => {
    expect(cleanText('<p>one</p>\n\n<p>two   three</p>')).toBe('one two three');
  });

  it('removes zero-width spaces but keeps joiners', () => {
    expect(cleanText('\u200Bর\u200D্যাব')).toBe('র\u200D্যাব');
  });
});

describe('parseStory', () => {
  it('maps story fields onto an article', () => {
    expect(parseStory(story)).toEqual({
      id: 'a1b2',
      headline: 'Flood & rain',
      subheadline: 'Rivers rising',
      summary: null,
      content: 'First para. Second bold. Third',
      mainAuthor: 'Staff Reporter',
      authors: 'Rahim,Karim',
      url: 'https://news.example.com/a1b2',
      readTime: 4,
      seoDescription: 'Floods hit the north',
      seoTags: 'flood,rain',
      tags: 'weather',
      sections: 'Bangladesh',
      wordCount: 120,
      publishedAt: 1609459200,
      firstPublishedAt: 0,
      lastPublishedAt: 0,
      createdAt: 1609459100,
      updatedAt: 0,
      contentUpdatedAt: 0,
    });
  });

  it('tolerates missing and mistyped fields', () => {
    const article = parseStory({ id: 42, cards: 'nope', tags: [], seo: { 'meta-keywords': 'a,b' } });
    expect(article).toMatchObject({
      id: '42',
      headline: '',
      content: '',
      tags: null,
      seoTags: 'a,b',
      readTime: 0,
    });
  });
});

describe('toUnixSeconds', () => {
  it('converts milliseconds and defaults to 0', () => {
    expect(toUnixSeconds(1632051372388)).toBe(1632051372);
    expect(toUnixSeconds('1632051372388')).toBe(1632051372);
    expect(toUnixSeconds(undefined)).toBe(0);
    expect(toUnixSeconds('soon')).toBe(0);
  });
});

describe('processStories', () => {
  it('keeps only articles with an id, headline and content', () => {
    const result = processStories([
      story,
      { id: 'no-content', headline: 'Headline only' },
      { headline: 'No id', cards: story.cards },
    ]);

    expect(result.rejected).toBe(2);
    expect(result.articles.map(article => article.id)).toEqual(['a1b2']);
    expect(result.articles.every(isAcceptable)).toBe(true);
  });
});
