import type { DeepReadonly, RecordCategory, ResourceDescriptor, ScrapeRequest } from '../types';
import { toResourceDescriptor } from '../adapters/reddit/urlParser';

export interface FetchTask {
  resource: ResourceDescriptor;
  category: RecordCategory;
  pageSize: number;
  /** `null` means follow cursors until the source runs out. */
  pageLimit: number | null;
}

type Request = DeepReadonly<ScrapeRequest>;

const wantsComments = (request: Request): boolean => request.searchForComments && !request.skipComments;

const pageSizeFor = (request: Request, category: RecordCategory, maxPageSize: number): number => {
  const requested = category === 'comments' ? request.commentsPerPage : request.postsPerPage;
  return Math.max(1, Math.min(requested, maxPageSize));
};

const searchTasks = (request: Request, resource: ResourceDescriptor): Omit<FetchTask, 'pageSize'>[] => {
  const tasks: Omit<FetchTask, 'pageSize'>[] = [];
  if (request.searchForPosts) tasks.push({ resource, category: 'posts', pageLimit: null });
  if (wantsComments(request)) tasks.push({ resource, category: 'comments', pageLimit: null });
  if (request.searchForCommunities) {
    tasks.push({ resource, category: 'communities', pageLimit: request.communityPagesLimit });
  }
  if (request.searchForUsers) tasks.push({ resource, category: 'users', pageLimit: request.userPagesLimit });
  return tasks;
};

const urlTasks = (request: Request, resource: ResourceDescriptor): Omit<FetchTask, 'pageSize'>[] => {
  const tasks: Omit<FetchTask, 'pageSize'>[] = [];

  switch (resource.type) {
    case 'subreddit':
      if (request.skipCommunity) break;
      if (request.searchForPosts) tasks.push({ resource, category: 'posts', pageLimit: null });
      if (wantsComments(request)) tasks.push({ resource, category: 'comments', pageLimit: null });
      if (request.searchForCommunities) tasks.push({ resource, category: 'communities', pageLimit: 1 });
      break;
    case 'user':
      if (request.skipUserPosts) break;
      if (request.searchForPosts) tasks.push({ resource, category: 'posts', pageLimit: request.userPagesLimit });
      if (wantsComments(request)) {
        tasks.push({ resource, category: 'comments', pageLimit: request.userPagesLimit });
      }
      if (request.searchForUsers) tasks.push({ resource, category: 'users', pageLimit: 1 });
      break;
    case 'post':
      if (request.searchForPosts) tasks.push({ resource, category: 'posts', pageLimit: 1 });
      if (wantsComments(request)) tasks.push({ resource, category: 'comments', pageLimit: 1 });
      break;
    default:
      break;
  }

  return tasks;
};

/**
 * 🗺️ Turns a validated request into the ordered list of paginated fetches.
 * Start URLs are processed in the order given; unknown URLs are skipped.
 */
export const planFetchTasks = (request: Request, maxPageSize: number): FetchTask[] => {
  const partial: Omit<FetchTask, 'pageSize'>[] = [];

  if (request.searchTerm) {
    partial.push(...searchTasks(request, { type: 'search', query: request.searchTerm }));
  } else {
    for (const url of request.startUrls ?? []) {
      const resource = toResourceDescriptor(url);
      if (resource) partial.push(...urlTasks(request, resource));
    }
  }

  return partial.map((task) => ({ ...task, pageSize: pageSizeFor(request, task.category, maxPageSize) }));
};
