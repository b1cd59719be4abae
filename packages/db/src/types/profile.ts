export const EMBEDDING_DIMENSION = 1536;

export type ProfileEmbedding = {
  profile: number[];
  interests: number[];
  expertise: number[];
};

export type Profile = {
  id: string;
  display_name: string | null;
  bio: string;
  seeking: string;
  offers: string;
  interests: string[];
  goals: string[];
  locality: string | null;
  /** Null until embeddings are generated; never an all-zero placeholder. */
  embedding: ProfileEmbedding | null;
  current_event_id: string | null;
  globally_eligible: boolean;
};
