import type { WireBounce } from './fake-postmark-api.js';

export function makeWireBounce(overrides: Partial<WireBounce> = {}): WireBounce {
  return {
    ID: 692560173,
    Type: 'HardBounce',
    TypeCode: 1,
    Name: 'Hard bounce',
    Description: 'The server was unable to deliver your message (ex: unknown user, mailbox not found).',
    Details: 'smtp;550 5.1.1 The email account that you tried to reach does not exist.',
    Email: 'missing-user@example.com',
    From: 'sender@example.com',
    BouncedAt: '2024-02-20T14:12:40.0000000-05:00',
    Inactive: true,
    CanActivate: true,
    Subject: 'Your receipt',
    MessageID: '2c1b63fe-43f2-4db5-91b0-8bdfa44a9316',
    Tag: 'receipts',
    MessageStream: 'outbound',
    ...overrides,
  };
}
