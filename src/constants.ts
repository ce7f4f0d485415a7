/**
 * Shared constants for the maintenance desk client
 */

// Backend
export const DEFAULT_API_URL = 'http://localhost:3030';
export const TICKETS_PATH = '/jotforms';

// API timeouts
export const API_TIMEOUT_MS = 10000; // 10 seconds

// Layout: share of the terminal height given to the ticket table
export const TABLE_HEIGHT_RATIO = 0.7;

// Client info
export const CLIENT_NAME = 'maintenance-desk';
export const CLIENT_VERSION = '1.0.0';
