/**
 * Ticket Entity - Domain Model
 */
export interface Ticket {
  readonly id: string;
  readonly submitter: SubmitterName;
  readonly submittedAt: SubmissionDate;
  readonly location: string;
  readonly exhibitName: string;
  readonly description: string;
  readonly priority: string;
  readonly department: string;
  readonly status: TicketStatus;
}

export interface SubmitterName {
  readonly first: string;
  readonly last: string;
}

/**
 * Calendar date as sent by the backend (`YYYY-MM-DD`) plus a free-form time of day
 */
export interface SubmissionDate {
  readonly date: string;
  readonly time: string;
}

export enum TicketStatus {
  OPEN = 'Open',
  IN_PROGRESS = 'InProgress',
  CLOSED = 'Closed',
  UNPLANNED = 'Unplanned'
}

/**
 * Known priority levels. The ticket keeps the raw string; these only drive styling.
 */
export enum TicketPriority {
  LOW = 'Low',
  MEDIUM = 'Medium',
  HIGH = 'High'
}

export enum TicketDepartment {
  EXHIBITS = 'Exhibits',
  OPERATIONS = 'Operations'
}
