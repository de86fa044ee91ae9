import { z } from 'zod';
import type { CommentRecord, CommunityRecord, PostRecord, RecordByCategory, RecordCategory, UserRecord } from '../../types';

const thingSchema = z.object({
  kind: z.string(),
  data: z.record(z.unknown()),
});

export type Thing = z.infer<typeof thingSchema>;

export const listingSchema = z.object({
  kind: z.literal('Listing'),
  data: z.object({
    after: z.string().nullable().optional(),
    children: z.array(thingSchema),
  }),
});

export const aboutSchema = thingSchema;

/** `/comments/{id}.json` answers with the post listing followed by the comment listing. */
export const postThreadSchema = z.tuple([listingSchema, listingSchema]);

type ThingData = Thing['data'];

const str = (data: ThingData, key: string, fallback = ''): string => {
  const value = data[key];
  return typeof value === 'string' ? value : fallback;
};

const num = (data: ThingData, key: string): number => {
  const value = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
};

const bool = (data: ThingData, key: string): boolean => data[key] === true;

export interface ParseContext {
  baseUrl: string;
  /** Title of the thread when comments come from a post page. */
  postTitle?: string;
}

export const parsePost = (thing: Thing, context: ParseContext): PostRecord | null => {
  if (thing.kind !== 't3') return null;
  const { data } = thing;
  return {
    id: str(data, 'id'),
    title: str(data, 'title'),
    author: str(data, 'author', '[deleted]'),
    subreddit: str(data, 'subreddit'),
    score: num(data, 'score'),
    numComments: num(data, 'num_comments'),
    createdUtc: num(data, 'created_utc'),
    permalink: `${context.baseUrl}${str(data, 'permalink')}`,
    url: str(data, 'url'),
    selftext: str(data, 'selftext'),
    domain: str(data, 'domain'),
    over18: bool(data, 'over_18'),
    pinned: bool(data, 'pinned') || bool(data, 'stickied'),
  };
};

export const parseComment = (thing: Thing, context: ParseContext): CommentRecord | null => {
  if (thing.kind !== 't1') return null;
  const { data } = thing;
  return {
    id: str(data, 'id'),
    body: str(data, 'body'),
    author: str(data, 'author', '[deleted]'),
    subreddit: str(data, 'subreddit'),
    score: num(data, 'score'),
    createdUtc: num(data, 'created_utc'),
    permalink: `${context.baseUrl}${str(data, 'permalink')}`,
    parentId: str(data, 'parent_id'),
    postTitle: context.postTitle ?? str(data, 'link_title'),
    over18: bool(data, 'over_18'),
  };
};

export const parseUser = (thing: Thing, context: ParseContext): UserRecord | null => {
  if (thing.kind !== 't2') return null;
  const { data } = thing;
  const username = str(data, 'name');
  const subreddit = data.subreddit;
  const profileOver18 =
    typeof subreddit === 'object' && subreddit !== null && 'over_18' in subreddit && subreddit.over_18 === true;
  return {
    id: str(data, 'id'),
    username,
    profileUrl: `${context.baseUrl}/user/${username}`,
    linkKarma: num(data, 'link_karma'),
    commentKarma: num(data, 'comment_karma'),
    createdUtc: num(data, 'created_utc'),
    over18: bool(data, 'over_18') || profileOver18,
  };
};

export const parseCommunity = (thing: Thing, context: ParseContext): CommunityRecord | null => {
  if (thing.kind !== 't5') return null;
  const { data } = thing;
  return {
    id: str(data, 'id'),
    name: str(data, 'display_name'),
    title: str(data, 'title'),
    description: str(data, 'public_description'),
    subscribers: num(data, 'subscribers'),
    url: `${context.baseUrl}${str(data, 'url')}`,
    createdUtc: num(data, 'created_utc'),
    over18: bool(data, 'over18'),
  };
};

export const RECORD_PARSERS: {
  [K in RecordCategory]: (thing: Thing, context: ParseContext) => RecordByCategory[K] | null;
} = {
  posts: parsePost,
  comments: parseComment,
  users: parseUser,
  communities: parseCommunity,
};
