import { TicketDepartment, TicketPriority, TicketStatus } from '../core/entities/Ticket.js';

export const colors = {
  text: '#C8C8C8',
  muted: '#969AAA',
  border: '#646478',
  headerBackground: '#32323C',
  rowBackground: '#1E1E28',
  selectedBackground: '#46465A',
  fallback: 'gray',
  error: '#FFB6C1'
} as const;

const STATUS_COLORS: Record<TicketStatus, string> = {
  [TicketStatus.OPEN]: '#90EE90',
  [TicketStatus.CLOSED]: '#FFB6C1',
  [TicketStatus.IN_PROGRESS]: '#D8BFD8',
  [TicketStatus.UNPLANNED]: '#696969'
};

// Priority and department are free text from the backend, so look them up in Maps
const PRIORITY_COLORS = new Map<string, string>([
  [TicketPriority.LOW, '#90EE90'],
  [TicketPriority.MEDIUM, '#FFFF99'],
  [TicketPriority.HIGH, '#FFB6C1']
]);

const DEPARTMENT_COLORS = new Map<string, string>([
  [TicketDepartment.EXHIBITS, '#FFB752'],
  [TicketDepartment.OPERATIONS, '#ADD8E6']
]);

export function statusColor(status: TicketStatus): string {
  return STATUS_COLORS[status];
}

export function priorityColor(priority: string): string {
  return PRIORITY_COLORS.get(priority) ?? colors.fallback;
}

export function departmentColor(department: string): string {
  return DEPARTMENT_COLORS.get(department) ?? colors.fallback;
}
