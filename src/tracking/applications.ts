import { z } from 'zod';

export const APPLICATION_STATUSES = [
  'applied',
  'interview_scheduled',
  'interviewed',
  'offer',
  'rejected',
  'withdrawn',
] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

const DAY_MS = 24 * 60 * 60 * 1000;

export const FOLLOW_UP_DAYS = 7;
export const EXPECTED_RESPONSE_DAYS = 14;
export const MOVE_ON_DAYS = 30;

function toDate(isoDate: string): Date {
  return new Date(`${isoDate}T00:00:00.000Z`);
}

/** Calendar date (YYYY-MM-DD, UTC) of the given instant */
export function isoDay(date: Date = new Date()): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number): string {
  return isoDay(new Date(toDate(isoDate).getTime() + days * DAY_MS));
}

const isoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a date as YYYY-MM-DD')
  .refine(value => {
    const date = toDate(value);
    return !Number.isNaN(date.getTime()) && isoDay(date) === value;
  }, 'must be a real calendar date');

const applicationFields = {
  status: z.enum(APPLICATION_STATUSES).default('applied'),
  appliedDate: isoDateSchema.optional(),
  notes: z.string().max(2000).optional(),
};

/** Body for recording an application against a stored job */
export const applicationUpdateSchema = z.object(applicationFields).strict();

/** Body for tracking an application to a posting that may not be stored yet */
export const trackApplicationSchema = z
  .object({
    url: z.string().url(),
    company: z.string().min(1),
    position: z.string().min(1),
    ...applicationFields,
  })
  .strict();

export type ApplicationUpdate = z.infer<typeof applicationUpdateSchema>;
export type TrackApplicationInput = z.infer<typeof trackApplicationSchema>;

export interface TrackedApplication {
  id: number;
  jobId: string;
  title: string;
  company: string;
  url: string | null;
  status: ApplicationStatus;
  appliedDate: string;
  followUpDate: string;
  notes: string | null;
  updatedAt: string;
}

export interface ApplicationTimeline {
  applied: string;
  followUp: string;
  expectedResponse: string;
  moveOn: string;
}

export function applicationTimeline(appliedDate: string): ApplicationTimeline {
  return {
    applied: appliedDate,
    followUp: addDays(appliedDate, FOLLOW_UP_DAYS),
    expectedResponse: addDays(appliedDate, EXPECTED_RESPONSE_DAYS),
    moveOn: addDays(appliedDate, MOVE_ON_DAYS),
  };
}

const NEXT_ACTIONS: Partial<Record<ApplicationStatus, string[]>> = {
  applied: [
    'Research the hiring manager',
    'Follow up if there is no reply within a week',
    'Prepare for a screening call',
    'Read up on recent company news',
  ],
  interview_scheduled: [
    'Research the interviewers',
    'Prepare technical examples relevant to the role',
    'Practise common interview questions',
    'Plan the interview logistics',
  ],
  interviewed: [
    'Send a thank-you email within 24 hours',
    'Note the questions asked for future preparation',
    'Follow up if there is no reply within their timeline',
    'Keep applying to other roles',
  ],
};

const DEFAULT_NEXT_ACTIONS = [
  'Update the status as things develop',
  'Keep applying to other roles',
  'Keep networking in the industry',
];

export function nextActionsFor(status: ApplicationStatus): string[] {
  return NEXT_ACTIONS[status] ?? DEFAULT_NEXT_ACTIONS;
}

export function daysSince(appliedDate: string, now: Date = new Date()): number {
  return Math.floor((toDate(isoDay(now)).getTime() - toDate(appliedDate).getTime()) / DAY_MS);
}

export interface ApplicationSummaryEntry extends TrackedApplication {
  daysSinceApplication: number;
  needsFollowUp: boolean;
}

export interface ApplicationSummary {
  total: number;
  byStatus: Record<string, number>;
  followUpsDue: number;
  applications: ApplicationSummaryEntry[];
}

/** Applications still marked `applied` a week or more after applying need a follow-up. */
export function summarizeApplications(applications: TrackedApplication[], now: Date = new Date()): ApplicationSummary {
  const byStatus: Record<string, number> = {};
  const entries = applications.map(application => {
    byStatus[application.status] = (byStatus[application.status] ?? 0) + 1;
    const days = daysSince(application.appliedDate, now);
    return {
      ...application,
      daysSinceApplication: days,
      needsFollowUp: application.status === 'applied' && days >= FOLLOW_UP_DAYS,
    };
  });

  return {
    total: entries.length,
    byStatus,
    followUpsDue: entries.filter(e => e.needsFollowUp).length,
    applications: entries,
  };
}
