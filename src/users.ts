/**
 * Users & Departments
 *
 * Registration of event organizers, the static allow/admin lists, department
 * maintenance and the statistics shown to admins.
 */

import type { Adapter, DepartmentCount, User } from './adapter'
import type { Clock } from './clock'
import { DuplicateKeyError, NotFoundError, ValidationError } from './errors'

// ============================================================================
// Types
// ============================================================================

export type UserInput = {
  id: number
  fullName: string
  department: string
  phone: string
}

export type AccessPolicy = {
  adminUserIds: readonly number[]
  /** Empty means everyone may use the bot */
  allowedUserIds: readonly number[]
}

export type Statistics = {
  totalEvents: number
  byDepartment: DepartmentCount[]
}

const PHONE_PATTERN = /^\+?\d{9,15}$/
export const MIN_FULL_NAME_LENGTH = 3

// ============================================================================
// Access
// ============================================================================

export function isAllowed(policy: AccessPolicy, userId: number): boolean {
  if (policy.adminUserIds.includes(userId)) return true
  return policy.allowedUserIds.length === 0 || policy.allowedUserIds.includes(userId)
}

export async function isRegistered(adapter: Adapter, userId: number): Promise<boolean> {
  return (await adapter.getUser(userId)) !== null
}

export async function isAdmin(adapter: Adapter, policy: AccessPolicy, userId: number): Promise<boolean> {
  if (policy.adminUserIds.includes(userId)) return true
  const user = await adapter.getUser(userId)
  return user?.isAdmin ?? false
}

// ============================================================================
// Registration
// ============================================================================

export function normalizePhone(phone: string): string {
  const compact = phone.replace(/[\s()-]/g, '')
  if (!PHONE_PATTERN.test(compact)) {
    throw new ValidationError(`Invalid phone number: '${phone}'`)
  }
  return compact
}

export async function registerUser(
  adapter: Adapter,
  clock: Clock,
  policy: AccessPolicy,
  input: UserInput,
): Promise<User> {
  const fullName = input.fullName.trim()
  if (fullName.length < MIN_FULL_NAME_LENGTH) {
    throw new ValidationError(`Full name must be at least ${MIN_FULL_NAME_LENGTH} characters`)
  }
  const phone = normalizePhone(input.phone)

  const departments = await adapter.getDepartments(true)
  if (!departments.some((d) => d.name === input.department)) {
    throw new ValidationError(`Unknown department: '${input.department}'`)
  }

  const user: User = {
    id: input.id,
    fullName,
    department: input.department,
    phone,
    isAdmin: policy.adminUserIds.includes(input.id),
    createdAt: clock.now(),
  }
  try {
    await adapter.createUser(user)
  } catch (error) {
    if (error instanceof DuplicateKeyError) {
      throw new ValidationError(`User '${input.id}' is already registered`)
    }
    throw error
  }
  return user
}

export async function getUser(adapter: Adapter, userId: number): Promise<User | null> {
  return adapter.getUser(userId)
}

// ============================================================================
// Departments
// ============================================================================

export async function listDepartments(adapter: Adapter, activeOnly = true): Promise<string[]> {
  return (await adapter.getDepartments(activeOnly)).map((d) => d.name)
}

/** Adds a department, or reactivates it when it was removed earlier. */
export async function addDepartment(adapter: Adapter, name: string): Promise<void> {
  const trimmed = name.trim()
  if (trimmed.length < 2) throw new ValidationError('Department name must be at least 2 characters')

  const existing = (await adapter.getDepartments(false)).find((d) => d.name === trimmed)
  if (existing?.active) throw new ValidationError(`Department '${trimmed}' already exists`)
  if (existing) {
    await adapter.setDepartmentActive(trimmed, true)
    return
  }
  await adapter.createDepartment(trimmed)
}

export async function removeDepartment(adapter: Adapter, name: string): Promise<void> {
  const existing = (await adapter.getDepartments(true)).find((d) => d.name === name)
  if (!existing) throw new NotFoundError(`Department '${name}' not found`)
  await adapter.setDepartmentActive(name, false)
}

// ============================================================================
// Statistics
// ============================================================================

export async function getStatistics(adapter: Adapter): Promise<Statistics> {
  const [totalEvents, byDepartment] = await Promise.all([
    adapter.countEvents(),
    adapter.countEventsByDepartment(),
  ])
  return { totalEvents, byDepartment }
}
