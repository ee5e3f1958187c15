export interface ProfileInfo {
  username: string;
  postsCount: number;
  followersCount: number;
  followingCount: number;
  hasStories: boolean;
  isVerified: boolean;
  bioText: string;
}

export function emptyProfileInfo(username: string): ProfileInfo {
  return {
    username,
    postsCount: 0,
    followersCount: 0,
    followingCount: 0,
    hasStories: false,
    isVerified: false,
    bioText: '',
  };
}

export type ProfileStatusKind = 'available' | 'private' | 'not_found' | 'suspended' | 'blocked';

export interface ProfileStatus {
  kind: ProfileStatusKind;
  blocked: boolean;
  private: boolean;
  notFound: boolean;
  suspended: boolean;
  reason?: string;
}
