import mongoose, { Schema, type InferSchemaType } from 'mongoose';

export const RequestStatuses = ['Open', 'In Progress', 'Resolved', 'Closed'] as const;
export type RequestStatus = (typeof RequestStatuses)[number];

export const RequestPriorities = ['Low', 'Medium', 'High', 'Critical'] as const;
export type RequestPriority = (typeof RequestPriorities)[number];

/** Dashboard ordering weight, higher is more urgent. */
export const PRIORITY_WEIGHT: Record<RequestPriority, number> = {
  Low: 1,
  Medium: 2,
  High: 3,
  Critical: 4,
};

export const ContactPreferences = ['email', 'phone', 'teams'] as const;
export type ContactPreference = (typeof ContactPreferences)[number];

export const DEFAULT_CATEGORIES = [
  'Password Reset',
  'Hardware Issue',
  'Software Installation',
  'Network Problem',
  'Printer Issue',
  'Email Problem',
  'Access Request',
  'Security Concern',
  'Other',
] as const;

export const Departments = ['IT', 'HR', 'Finance', 'Marketing', 'Operations', 'Sales', 'Executive'] as const;
export type Department = (typeof Departments)[number];

export interface ServiceRequest {
  id: number;
  requesterName: string;
  contact: string;
  department: Department | null;
  category: string;
  description: string;
  priority: RequestPriority;
  contactPreference: ContactPreference;
  status: RequestStatus;
  assignedTo: string | null;
  createdAt: Date;
  updatedAt: Date;
  resolvedAt: Date | null;
}

export type NewServiceRequest = Omit<ServiceRequest, 'id'>;

/** Active statuses, shown in the dashboard work queue. */
export const ActiveStatuses: readonly RequestStatus[] = ['Open', 'In Progress'];

/** Most urgent first, then oldest first. */
export function compareUrgency(a: ServiceRequest, b: ServiceRequest): number {
  return (
    PRIORITY_WEIGHT[b.priority] - PRIORITY_WEIGHT[a.priority] ||
    a.createdAt.getTime() - b.createdAt.getTime() ||
    a.id - b.id
  );
}

// createdAt/updatedAt are written by the lifecycle engine, not mongoose timestamps,
// so updatedAt stays strictly increasing under the engine's clock.
const serviceRequestSchema = new Schema(
  {
    requestId: { type: Number, required: true, unique: true },
    requesterName: { type: String, required: true, trim: true, maxlength: 100 },
    contact: { type: String, required: true, trim: true, lowercase: true, maxlength: 120 },
    department: { type: String, trim: true, default: null },
    category: { type: String, required: true, trim: true, index: true },
    description: { type: String, required: true, maxlength: 5000 },
    priority: { type: String, enum: RequestPriorities, default: 'Medium', index: true },
    // PRIORITY_WEIGHT[priority], stored so the work queue can sort in the database.
    priorityWeight: { type: Number, required: true },
    contactPreference: { type: String, enum: ContactPreferences, default: 'email' },
    status: { type: String, enum: RequestStatuses, default: 'Open', index: true },
    assignedTo: { type: String, trim: true, maxlength: 100, default: null },
    createdAt: { type: Date, required: true, immutable: true },
    updatedAt: { type: Date, required: true },
    resolvedAt: { type: Date, default: null },
  },
  { versionKey: false }
);

serviceRequestSchema.index({ status: 1, createdAt: -1 });
serviceRequestSchema.index({ createdAt: -1 });
serviceRequestSchema.index({ status: 1, priorityWeight: -1, createdAt: 1, requestId: 1 });

export type ServiceRequestDoc = InferSchemaType<typeof serviceRequestSchema>;
export const ServiceRequestModel = mongoose.model('ServiceRequest', serviceRequestSchema);
