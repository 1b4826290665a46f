import mongoose, { Schema, type InferSchemaType } from 'mongoose';

export interface AdminAccount {
  id: string;
  username: string;
  passwordHash: string;
  email: string;
  fullName: string;
  isActive: boolean;
  isSuperAdmin: boolean;
  lastLoginAt: Date | null;
  loginAttempts: number;
  lockedUntil: Date | null;
  createdAt: Date;
}

export type NewAdminAccount = Pick<AdminAccount, 'username' | 'passwordHash' | 'email' | 'fullName'> &
  Partial<Pick<AdminAccount, 'isSuperAdmin' | 'isActive'>>;

export type AdminLoginState = Partial<Pick<AdminAccount, 'loginAttempts' | 'lockedUntil' | 'lastLoginAt'>>;

/** What the session guard hands to admin-only handlers. Never carries the hash. */
export type AdminPrincipal = Pick<AdminAccount, 'id' | 'username' | 'email' | 'fullName' | 'isSuperAdmin'>;

export function toAdminPrincipal(admin: AdminAccount): AdminPrincipal {
  return {
    id: admin.id,
    username: admin.username,
    email: admin.email,
    fullName: admin.fullName,
    isSuperAdmin: admin.isSuperAdmin,
  };
}

const adminUserSchema = new Schema(
  {
    username: { type: String, required: true, trim: true, lowercase: true, unique: true, maxlength: 80 },
    passwordHash: { type: String, required: true },
    email: { type: String, required: true, trim: true, lowercase: true, maxlength: 120 },
    fullName: { type: String, required: true, trim: true, maxlength: 100 },
    isActive: { type: Boolean, default: true },
    isSuperAdmin: { type: Boolean, default: false },
    lastLoginAt: { type: Date, default: null },
    loginAttempts: { type: Number, default: 0 },
    lockedUntil: { type: Date, default: null },
  },
  { timestamps: true }
);

export type AdminUserDoc = InferSchemaType<typeof adminUserSchema>;
export const AdminUserModel = mongoose.model('AdminUser', adminUserSchema);
