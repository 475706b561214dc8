import { DocumentScanner, StoredDocument } from '../types/pagination';
import { UserDirectoryItem, UserProfile } from '../types/user';
import { asNullableString, asString, asStringArray } from '../utils/recordFields';
import { FeedSource } from './pageFetcher';

export const USER_SORT_FIELD = 'name';

// Public projection: password hashes and contact details other than email never leave the repository
export function toUserProfile(record: StoredDocument): UserProfile {
  const data = record.data;
  return {
    uid: record.id,
    name: asNullableString(data.name),
    email: asString(data.email),
    role: asString(data.role),
    profession: asString(data.profession),
    bio: asString(data.bio),
    profile_picture: asString(data.profile_picture),
    interests: asStringArray(data.interests),
  };
}

export function createUserDirectorySource(scanner: DocumentScanner): FeedSource<UserDirectoryItem> {
  return {
    name: 'users',
    scanner,
    sortField: USER_SORT_FIELD,
    toItem: (record) => ({
      sortKey: record.sortKey,
      tieBreakId: record.id,
      user: toUserProfile(record),
    }),
  };
}
