export interface PaperOwner {
  id: number;
  username: string;
  displayName: string | null;
  bio: string | null;
}

export interface Paper {
  id: number;
  ownerId: number;
  title: string;
  authors: string;
  abstract: string | null;
  summary: string;
  arxivId: string | null;
  doi: string | null;
  paperUrl: string | null;
  dateRead: string | null;
  isPrivate: boolean;
  tags: string[];
  createdAt: string;
  updatedAt: string;
}

export interface User {
  id: number;
  username: string;
  displayName: string | null;
  bio: string | null;
  createdAt: string;
}

/**
 * The caller a read is performed for. `null` is an anonymous caller.
 */
export type Viewer = { id: number } | null;
