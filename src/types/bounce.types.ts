/**
 * Bounce types
 */

/**
 * Delivery failure record reported by Postmark. Read-only.
 */
export interface Bounce {
  id: number;
  type: string;
  typeCode: number;
  description: string;
  details: string;
  email: string;
  from?: string;
  bouncedAt: string;
  inactive: boolean;
  canActivate: boolean;
  subject: string;
  messageId: string;
  tag?: string;
  messageStream?: string;
}

/**
 * Optional filters for the bounce listing
 */
export interface BounceFilter {
  type?: string;
  inactive?: boolean;
  emailFilter?: string;
  tag?: string;
  messageId?: string;
  fromDate?: string;
  toDate?: string;
}
