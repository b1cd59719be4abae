import type { Profile, ProfileEmbedding } from "../../packages/db/src/types/profile";

export function makeProfile(overrides: Partial<Profile> & { id: string }): Profile {
  return {
    display_name: null,
    bio: "",
    seeking: "",
    offers: "",
    interests: [],
    goals: [],
    locality: null,
    embedding: null,
    current_event_id: null,
    globally_eligible: false,
    ...overrides,
  };
}

export function makeEmbedding(seed: number, dimension = 3): ProfileEmbedding {
  const vector = Array.from({ length: dimension }, (_, index) => seed + index / 10);
  return { profile: vector, interests: [...vector], expertise: [...vector] };
}
