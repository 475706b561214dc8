import { OrderedItem } from './pagination';

export interface UserProfile {
  uid: string;
  name: string | null;
  email?: string;
  role?: string;
  profession?: string;
  bio?: string;
  profile_picture?: string;
  interests: string[];
}

export interface UserDirectoryItem extends OrderedItem {
  user: UserProfile;
}

export interface UserFilters {
  role?: string;
  profession?: string;
}
