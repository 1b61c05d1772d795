import { readFileSync } from 'fs';
import { z } from 'zod';

export const DEFAULT_MIN_SALARY = 50000;

export interface UserProfile {
  skills: string[];
  experience: string[];
  qualifications: string[];
  minSalary: number;
}

// An empty term would be contained in every listing
const profileTerm = z.string().min(1, 'must not be empty');

export const profileUpdateSchema = z
  .object({
    skills: z.array(profileTerm),
    experience: z.array(profileTerm),
    qualifications: z.array(profileTerm),
    minSalary: z.number().int().nonnegative(),
  })
  .partial()
  .strict();

export type ProfileUpdate = z.infer<typeof profileUpdateSchema>;

export function createUserProfile(): UserProfile {
  return { skills: [], experience: [], qualifications: [], minSalary: DEFAULT_MIN_SALARY };
}

/**
 * Holds the searcher's profile for one session (a server instance or a CLI run).
 * Updates replace each supplied field wholesale; lists are never merged.
 */
export class ProfileSession {
  private profile: UserProfile;

  constructor(initial: UserProfile = createUserProfile()) {
    this.profile = cloneProfile(initial);
  }

  update(update: ProfileUpdate): UserProfile {
    const parsed = profileUpdateSchema.parse(update);
    if (parsed.skills) this.profile.skills = [...parsed.skills];
    if (parsed.experience) this.profile.experience = [...parsed.experience];
    if (parsed.qualifications) this.profile.qualifications = [...parsed.qualifications];
    if (parsed.minSalary !== undefined) this.profile.minSalary = parsed.minSalary;
    return this.snapshot();
  }

  /** A copy that later updates will not reach into */
  snapshot(): UserProfile {
    return cloneProfile(this.profile);
  }
}

function cloneProfile(profile: UserProfile): UserProfile {
  return {
    skills: [...profile.skills],
    experience: [...profile.experience],
    qualifications: [...profile.qualifications],
    minSalary: profile.minSalary,
  };
}

export function loadProfileFile(path: string): UserProfile {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    throw new Error(`Profile file not found: ${path}`);
  }

  const update = profileUpdateSchema.parse(JSON.parse(raw));
  return new ProfileSession().update(update);
}
