import type { AddressInfo } from 'node:net';
import type { Server } from 'node:http';
import axios, { AxiosInstance } from 'axios';
import bcrypt from 'bcryptjs';
import { createApp } from '../../src/app';
import { AppContainer, ContainerConfig, createContainer } from '../../src/container';
import type { NotificationSender, OutgoingMail } from '../../src/services/notification.service';
import { BorrowerRole } from '../../src/types/borrower.types';
import type { Borrower } from '../../src/types/borrower.types';
import { InMemoryStore } from './in-memory-store';

export const TEST_PASSWORD = 'test-password';

/**
 * Sender that keeps every message in memory
 */
export class CapturingSender implements NotificationSender {
  readonly sent: OutgoingMail[] = [];
  failuresLeft = 0;

  async send(mail: OutgoingMail): Promise<void> {
    if (this.failuresLeft > 0) {
      this.failuresLeft -= 1;
      throw new Error('mail provider unavailable');
    }
    this.sent.push(mail);
  }

  lastCodeFor(email: string): string {
    const mail = [...this.sent].reverse().find((m) => m.to === email && m.subject === 'Your login code');
    const code = mail?.text?.match(/\b(\d{6})\b/)?.[1];
    if (!code) throw new Error(`No login code sent to ${email}`);
    return code;
  }
}

export const testConfig = (overrides: Partial<ContainerConfig> = {}): ContainerConfig => ({
  jwtSecret: 'test-secret-value',
  jwtExpiresInSeconds: 3600,
  otpTtlMinutes: 5,
  pendingReturnsEnabled: false,
  overReturnPolicy: 'reject',
  dedupeWindowMs: 10_000,
  institutionName: 'Test Laboratory',
  timeZone: 'UTC',
  notifyMaxAttempts: 2,
  notifyRetryDelayMs: 1,
  ...overrides,
});

export interface TestServer {
  store: InMemoryStore;
  sender: CapturingSender;
  container: AppContainer;
  http: AxiosInstance;
  close(): Promise<void>;
}

/**
 * Start the real Express app on an ephemeral port, backed by the in-memory store
 */
export async function startTestServer(overrides: Partial<ContainerConfig> = {}): Promise<TestServer> {
  const store = new InMemoryStore(overrides.now);
  const sender = new CapturingSender();
  const container = createContainer(store.repositories(), sender, testConfig(overrides));
  const app = createApp(container, { allowedOrigins: '*' });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address: AddressInfo | string | null = server.address();
  if (!address || typeof address === 'string') throw new Error('Test server has no TCP address');

  const http = axios.create({
    baseURL: `http://127.0.0.1:${address.port}`,
    validateStatus: () => true,
  });

  return {
    store,
    sender,
    container,
    http,
    close: async () => {
      await container.dispatcher.drain();
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}

/**
 * Create a staff account in the store and sign in through the API
 */
export async function signIn(server: TestServer, email = 'desk@example.edu'): Promise<string> {
  const existing = [...server.store.admins.values()].find((admin) => admin.email === email);

  if (!existing) {
    await server.store.repositories().admins.create({
      firstName: 'Desk',
      lastName: 'Staff',
      email,
      passwordHash: await bcrypt.hash(TEST_PASSWORD, 4),
    });
  }

  const login = await server.http.post('/v1/auth/login', { email, password: TEST_PASSWORD });
  if (login.status !== 200) throw new Error(`Login failed with ${login.status}`);

  const otp = server.sender.lastCodeFor(email);
  const verified = await server.http.post('/v1/auth/verify-otp', { email, otp });
  if (verified.status !== 200) throw new Error(`Code verification failed with ${verified.status}`);

  return verified.data.data.token;
}

export const authHeader = (token: string) => ({ headers: { Authorization: `Bearer ${token}` } });

let badgeCounter = 0;

export function seedBorrower(
  store: InMemoryStore,
  role: BorrowerRole = BorrowerRole.STUDENT,
  email: string | null = null
): Borrower {
  badgeCounter += 1;
  return store.addBorrower({
    rfid: `RFID-${role}-${badgeCounter}`,
    borrowerCode: `${role.toUpperCase()}-${badgeCounter}`,
    firstName: role === BorrowerRole.INSTRUCTOR ? 'Ivy' : 'Sam',
    lastName: `Tester${badgeCounter}`,
    department: 'Chemistry',
    course: 'BS Chem',
    role,
    email,
  });
}
