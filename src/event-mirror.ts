/**
 * Event Mirror
 *
 * Write-behind copy of the event registry kept outside the store (a shared
 * spreadsheet, a calendar). Called after a lifecycle change commits.
 */

import type { Event, User } from './adapter'

export interface EventMirror {
  eventCreated(event: Event, owner: User | null): Promise<void>
  eventUpdated(event: Event, owner: User | null): Promise<void>
  eventCancelled(event: Event): Promise<void>
}
