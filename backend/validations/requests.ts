import { z } from 'zod';
import {
  ContactPreferences,
  DEFAULT_CATEGORIES,
  Departments,
  RequestPriorities,
} from '../models/ServiceRequest.js';

function emptyStringToUndefined(value: unknown) {
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string' && value.trim() === '') return undefined;
  return value;
}

/** Case-insensitive match against a fixed list; unmatched values pass through for the enum to reject. */
function canonical<T extends string>(allowed: readonly T[]) {
  return (value: unknown) => {
    const v = emptyStringToUndefined(value);
    if (typeof v !== 'string') return v;
    const wanted = v.trim().toLowerCase();
    return allowed.find((a) => a.toLowerCase() === wanted) ?? v.trim();
  };
}

export function buildCategorySet(extra: readonly string[] = []): string[] {
  return Array.from(new Set<string>([...DEFAULT_CATEGORIES, ...extra]));
}

// Legacy forms post `name`/`email`; JSON clients send requester_name/contact.
function withFieldAliases(value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
  const body: Record<string, unknown> = { ...value };
  if (body.requester_name === undefined && body.name !== undefined) body.requester_name = body.name;
  if (body.contact === undefined && body.email !== undefined) body.contact = body.email;
  return body;
}

export function buildSubmissionSchema(categories: readonly string[]) {
  const [first, ...rest] = categories;
  if (first === undefined) throw new Error('At least one request category is required');

  return z.preprocess(
    withFieldAliases,
    z.object({
      requester_name: z.string().trim().min(1, 'Name is required').max(100),
      contact: z.string().trim().toLowerCase().min(1, 'Contact email is required').max(120).email('Please provide a valid email address'),
      department: z.preprocess(canonical(Departments), z.enum(Departments).optional()),
      category: z.preprocess(canonical(categories), z.enum([first, ...rest])),
      description: z.string().trim().min(1, 'Description is required').max(5000),
      priority: z.preprocess(canonical(RequestPriorities), z.enum(RequestPriorities).default('Medium')),
      contact_preference: z.preprocess(canonical(ContactPreferences), z.enum(ContactPreferences).default('email')),
    })
  );
}

export type SubmissionInput = z.infer<ReturnType<typeof buildSubmissionSchema>>;

export const statusUpdateSchema = z.object({
  status: z.string().trim().min(1, 'Status is required').max(40),
  assigned_to: z.preprocess(emptyStringToUndefined, z.string().trim().max(100).optional()),
});

const optionalQueryString = z.preprocess(
  (value) => emptyStringToUndefined(Array.isArray(value) ? value[0] : value),
  z.string().trim().max(100).optional()
);

export const listQuerySchema = z.object({
  status: optionalQueryString,
  category: optionalQueryString,
  department: optionalQueryString,
  priority: optionalQueryString,
});
