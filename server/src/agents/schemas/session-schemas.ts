import { z } from 'zod';
import { DEFAULT_ROLE } from '../knowledge/question-bank.js';
import { GRADES } from '../types.js';

export const ProfileSchema = z.object({
  name: z.string().trim().min(1).max(200),
  role: z.string().trim().min(1).max(200).default(DEFAULT_ROLE),
  grade_target: z.enum(GRADES).default('Junior'),
  experience: z.string().max(5_000).default(''),
});

/** Scripted console run: a profile and the messages to send in order */
export const InterviewScriptSchema = z.object({
  profile: ProfileSchema,
  messages: z.array(z.string()).min(1),
});

export type InterviewScript = z.infer<typeof InterviewScriptSchema>;
