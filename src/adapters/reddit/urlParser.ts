import type { ResourceDescriptor } from '../../types';

export type ParsedRedditUrl =
  | { type: 'subreddit'; subreddit: string; cleanedUrl: string }
  | { type: 'user'; username: string; cleanedUrl: string }
  | { type: 'post'; subreddit: string; postId: string; cleanedUrl: string }
  | { type: 'comment'; subreddit: string; postId: string; commentId: string; cleanedUrl: string }
  | { type: 'unknown'; cleanedUrl: string };

const REDDIT_HOSTS = new Set(['reddit.com', 'www.reddit.com', 'old.reddit.com', 'new.reddit.com', 'np.reddit.com']);

const SUBREDDIT_PATTERN = /^r\/([^/]+)(?:\/(?:hot|new|top|rising))?\/?$/;
const USER_PATTERN = /^(?:user|u)\/([^/]+)(?:\/(?:submitted|comments|overview))?\/?$/;
const POST_PATTERN = /^r\/([^/]+)\/comments\/([^/]+)(?:\/([^/]+)(?:\/([^/]+))?)?\/?$/;

export const isRedditUrl = (url: string): boolean => {
  try {
    const parsed = new URL(url);
    return (parsed.protocol === 'https:' || parsed.protocol === 'http:') && REDDIT_HOSTS.has(parsed.hostname);
  } catch {
    return false;
  }
};

/**
 * 🔗 Classifies a Reddit URL as subreddit, user, post or comment permalink.
 * Query strings and fragments are dropped from `cleanedUrl`.
 */
export const parseRedditUrl = (url: string): ParsedRedditUrl => {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { type: 'unknown', cleanedUrl: url };
  }

  const cleanedUrl = `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  if (!REDDIT_HOSTS.has(parsed.hostname)) return { type: 'unknown', cleanedUrl };

  const path = parsed.pathname.replace(/^\/+|\/+$/g, '');

  const subreddit = SUBREDDIT_PATTERN.exec(path);
  if (subreddit) return { type: 'subreddit', subreddit: subreddit[1], cleanedUrl };

  const user = USER_PATTERN.exec(path);
  if (user) return { type: 'user', username: user[1], cleanedUrl };

  const post = POST_PATTERN.exec(path);
  if (post) {
    const commentId = post[4];
    return commentId
      ? { type: 'comment', subreddit: post[1], postId: post[2], commentId, cleanedUrl }
      : { type: 'post', subreddit: post[1], postId: post[2], cleanedUrl };
  }

  return { type: 'unknown', cleanedUrl };
};

/**
 * Maps a start URL to the resource the gateway fetches. Comment permalinks
 * resolve to their post; unknown URLs yield `null`.
 */
export const toResourceDescriptor = (url: string): ResourceDescriptor | null => {
  const parsed = parseRedditUrl(url);
  switch (parsed.type) {
    case 'subreddit':
      return { type: 'subreddit', name: parsed.subreddit };
    case 'user':
      return { type: 'user', username: parsed.username };
    case 'post':
    case 'comment':
      return { type: 'post', subreddit: parsed.subreddit, postId: parsed.postId };
    default:
      return null;
  }
};
