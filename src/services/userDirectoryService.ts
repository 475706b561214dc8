import { FeedSource } from '../repository/pageFetcher';
import { PageParams, PaginatedPayload, Predicate } from '../types/pagination';
import { UserDirectoryItem, UserFilters, UserProfile } from '../types/user';
import { PaginationService, toPaginatedPayload } from './paginationService';

export function buildUserPredicates(filters: UserFilters): Predicate[] {
  const out: Predicate[] = [];
  if (filters.role) out.push({ kind: 'equals', field: 'role', value: filters.role });
  if (filters.profession) out.push({ kind: 'equals', field: 'profession', value: filters.profession });
  return out;
}

export interface UserDirectoryService {
  listUsers(filters: UserFilters, page: PageParams): Promise<PaginatedPayload<UserProfile>>;
}

export function createUserDirectoryService(deps: {
  source: FeedSource<UserDirectoryItem>;
  pagination: PaginationService;
}): UserDirectoryService {
  return {
    async listUsers(filters, page) {
      const result = await deps.pagination.paginate(deps.source, {
        cursorToken: page.cursor,
        pageSize: page.pageSize,
        direction: page.direction,
        filters: buildUserPredicates(filters),
        timeoutMs: page.timeoutMs,
      });
      return toPaginatedPayload(result, page.pageSize, (item) => item.user);
    },
  };
}
