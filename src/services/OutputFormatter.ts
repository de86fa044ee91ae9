import type { DeepReadonly, OutputFormat, ResponseMetadata, ResultCollections } from '../types';
import { CONTENT_TYPES, FILE_EXTENSIONS, RSS_MAX_ITEMS, TEXT_FIELD_LIMIT } from '../utils/constants';

type Collections = DeepReadonly<ResultCollections>;
type Cell = string | number | boolean;

// ---------------------------------------------------------------------------
// Escaping helpers
// ---------------------------------------------------------------------------

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export const escapeXml = (value: string): string => value.replace(/[&<>"']/g, (char) => XML_ESCAPES[char] ?? char);

export const escapeCsvCell = (value: Cell): string => {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
};

const singleLine = (value: string): string => value.replace(/[\r\n]/g, ' ');
const truncate = (value: string, limit = TEXT_FIELD_LIMIT): string => value.slice(0, limit);

const csvSection = (header: string[], rows: Cell[][]): string =>
  [header, ...rows].map((row) => row.map(escapeCsvCell).join(',')).join('\n') + '\n';

const element = (name: string, value: string, indent: string): string =>
  `${indent}<${name}>${escapeXml(value)}</${name}>`;

const scalarText = (value: unknown): string | null => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
};

// ---------------------------------------------------------------------------
// Formats
// ---------------------------------------------------------------------------

const formatJson = (data: Collections): string => JSON.stringify(data, null, 2);

const formatCsv = (data: Collections): string => {
  const sections: string[] = [];

  if (data.posts.length > 0) {
    sections.push(
      csvSection(
        ['type', 'id', 'title', 'url', 'author', 'subreddit', 'score', 'num_comments', 'created_utc', 'permalink', 'selftext', 'domain', 'is_nsfw', 'is_pinned'],
        data.posts.map((post) => [
          'post',
          post.id,
          singleLine(post.title),
          post.url,
          post.author,
          post.subreddit,
          post.score,
          post.numComments,
          post.createdUtc,
          post.permalink,
          truncate(singleLine(post.selftext)),
          post.domain,
          post.over18,
          post.pinned,
        ]),
      ),
    );
  }

  if (data.comments.length > 0) {
    sections.push(
      csvSection(
        ['type', 'id', 'body', 'author', 'subreddit', 'score', 'created_utc', 'permalink', 'parent_id', 'post_title'],
        data.comments.map((comment) => [
          'comment',
          comment.id,
          truncate(singleLine(comment.body)),
          comment.author,
          comment.subreddit,
          comment.score,
          comment.createdUtc,
          comment.permalink,
          comment.parentId,
          singleLine(comment.postTitle),
        ]),
      ),
    );
  }

  if (data.users.length > 0) {
    sections.push(
      csvSection(
        ['type', 'id', 'username', 'profile_url', 'link_karma', 'comment_karma', 'created_utc', 'is_nsfw'],
        data.users.map((user) => [
          'user',
          user.id,
          user.username,
          user.profileUrl,
          user.linkKarma,
          user.commentKarma,
          user.createdUtc,
          user.over18,
        ]),
      ),
    );
  }

  if (data.communities.length > 0) {
    sections.push(
      csvSection(
        ['type', 'id', 'name', 'title', 'description', 'subscribers', 'url', 'created_utc', 'is_nsfw'],
        data.communities.map((community) => [
          'community',
          community.id,
          community.name,
          singleLine(community.title),
          truncate(singleLine(community.description)),
          community.subscribers,
          community.url,
          community.createdUtc,
          community.over18,
        ]),
      ),
    );
  }

  return sections.join('\n');
};

const channelTitle = (metadata: ResponseMetadata): string => {
  const params = metadata.requestParams;
  const searchTerm = 'searchTerm' in params ? params.searchTerm : undefined;
  const startUrls = 'startUrls' in params ? params.startUrls : undefined;
  if (typeof searchTerm === 'string' && searchTerm) return `Reddit Search: ${searchTerm}`;
  if (Array.isArray(startUrls)) return `Reddit Content from ${startUrls.length} sources`;
  return 'RedditExtractor Feed';
};

const formatRss = (data: Collections, metadata: ResponseMetadata): string => {
  const lines = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<rss version="2.0" xmlns:atom="http://www.w3.org/2005/Atom">',
    '  <channel>',
    element('title', channelTitle(metadata), '    '),
    element('description', `Reddit content extracted by RedditExtractor - ${data.posts.length} posts`, '    '),
    element('link', 'https://reddit.com', '    '),
    element('generator', 'RedditExtractor API', '    '),
    element('lastBuildDate', new Date(metadata.scrapedAt).toUTCString(), '    '),
  ];

  for (const post of data.posts.slice(0, RSS_MAX_ITEMS)) {
    const text = post.selftext || `Reddit post from r/${post.subreddit || 'unknown'}`;
    const description = text.length > TEXT_FIELD_LIMIT ? `${truncate(text)}...` : text;

    lines.push('    <item>');
    lines.push(element('title', post.title || 'Untitled Post', '      '));
    lines.push(element('link', post.url || post.permalink, '      '));
    lines.push(element('description', description, '      '));
    lines.push(element('author', `u/${post.author || 'unknown'}`, '      '));
    lines.push(element('category', `r/${post.subreddit || 'unknown'}`, '      '));
    lines.push(`      <guid isPermaLink="false">${escapeXml(post.id)}</guid>`);
    if (post.createdUtc > 0) {
      lines.push(element('pubDate', new Date(post.createdUtc * 1000).toUTCString(), '      '));
    }
    lines.push('    </item>');
  }

  lines.push('  </channel>', '</rss>');
  return lines.join('\n') + '\n';
};

const xmlCollection = (
  lines: string[],
  name: string,
  itemName: string,
  items: ReadonlyArray<Readonly<Record<string, unknown>>>,
): void => {
  if (items.length === 0) return;
  lines.push(`  <${name}>`);
  for (const item of items) {
    lines.push(`    <${itemName}>`);
    for (const [key, value] of Object.entries(item)) {
      const text = scalarText(value);
      if (text !== null) lines.push(element(key, text, '      '));
    }
    lines.push(`    </${itemName}>`);
  }
  lines.push(`  </${name}>`);
};

const formatXml = (data: Collections, metadata: ResponseMetadata): string => {
  const lines = ['<?xml version="1.0" encoding="UTF-8"?>', '<redditData>', '  <metadata>'];

  for (const [key, value] of Object.entries(metadata)) {
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      lines.push(`    <${key}>`);
      for (const [subKey, subValue] of Object.entries(value)) {
        lines.push(element(subKey, scalarText(subValue) ?? '', '      '));
      }
      lines.push(`    </${key}>`);
    } else {
      lines.push(element(key, scalarText(value) ?? '', '    '));
    }
  }
  lines.push('  </metadata>');

  xmlCollection(lines, 'posts', 'post', data.posts);
  xmlCollection(lines, 'comments', 'comment', data.comments);
  xmlCollection(lines, 'users', 'user', data.users);
  xmlCollection(lines, 'communities', 'community', data.communities);

  lines.push('</redditData>');
  return lines.join('\n') + '\n';
};

/**
 * 🖨️ Renders result collections into one of the supported formats.
 *
 * Rendering is a pure function of its inputs: the RSS build date comes from
 * `metadata.scrapedAt`, so identical inputs give byte-identical output.
 */
export const OutputFormatter = {
  render(data: Collections, format: OutputFormat, metadata: ResponseMetadata): string {
    switch (format) {
      case 'json':
        return formatJson(data);
      case 'csv':
        return formatCsv(data);
      case 'rss':
        return formatRss(data, metadata);
      case 'xml':
        return formatXml(data, metadata);
      default:
        throw new RangeError(`Unsupported output format: ${String(format)}`);
    }
  },

  contentType(format: OutputFormat): string {
    return CONTENT_TYPES[format] ?? CONTENT_TYPES.json;
  },

  fileExtension(format: OutputFormat): string {
    return FILE_EXTENSIONS[format] ?? FILE_EXTENSIONS.json;
  },
};
