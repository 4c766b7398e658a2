import { readFile } from 'fs/promises';
import path from 'path';
import { google, type drive_v3, type sheets_v4 } from 'googleapis';
import type { JWT } from 'google-auth-library';
import { z } from 'zod';
import type { LeyningEnvConfig } from '../config/env';
import { ConfigError, SinkUnavailableError, errorMessage } from '../src/leyning/errors';

const SCOPES = ['https://www.googleapis.com/auth/drive', 'https://www.googleapis.com/auth/spreadsheets'];

const SPREADSHEET_MIME = 'application/vnd.google-apps.spreadsheet';

const ServiceAccountSchema = z
  .object({
    client_email: z.string().min(1),
    private_key: z.string().min(1),
  })
  .passthrough();

export interface GoogleClients {
  sheets: sheets_v4.Sheets;
  drive: drive_v3.Drive;
}

async function readServiceAccount(file: string): Promise<{ email: string; key: string }> {
  const resolved = path.resolve(process.cwd(), file);
  let raw: string;
  try {
    raw = await readFile(resolved, 'utf8');
  } catch (err) {
    throw new ConfigError(`Unable to read Google credentials from ${resolved}: ${errorMessage(err)}`);
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Google credentials in ${resolved} are not valid JSON: ${errorMessage(err)}`);
  }
  const parsed = ServiceAccountSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Google credentials in ${resolved} need client_email and private_key`);
  }
  return { email: parsed.data.client_email, key: parsed.data.private_key };
}

async function getAuth(config: LeyningEnvConfig): Promise<JWT> {
  const { email, key } =
    config.clientEmail && config.privateKey
      ? { email: config.clientEmail, key: config.privateKey.replace(/\\n/g, '\n') }
      : await readServiceAccount(config.credentialsFile);
  return new google.auth.JWT({ email, key, scopes: SCOPES });
}

export async function createGoogleClients(config: LeyningEnvConfig): Promise<GoogleClients> {
  const auth = await getAuth(config);
  return {
    sheets: google.sheets({ version: 'v4', auth }),
    drive: google.drive({ version: 'v3', auth }),
  };
}

export interface Workbook {
  spreadsheetId: string;
  url: string;
  created: boolean;
}

function spreadsheetUrl(id: string): string {
  return `https://docs.google.com/spreadsheets/d/${id}`;
}

function escapeQuery(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/** Finds the spreadsheet with this exact title in Drive, creating it when none exists. */
export async function openOrCreateSpreadsheet(clients: GoogleClients, title: string): Promise<Workbook> {
  try {
    const found = await clients.drive.files.list({
      q: `name = '${escapeQuery(title)}' and mimeType = '${SPREADSHEET_MIME}' and trashed = false`,
      fields: 'files(id, name, webViewLink)',
      pageSize: 1,
    });
    const existing = found.data.files?.[0];
    if (existing?.id) {
      return { spreadsheetId: existing.id, url: existing.webViewLink ?? spreadsheetUrl(existing.id), created: false };
    }

    const res = await clients.sheets.spreadsheets.create({
      requestBody: { properties: { title } },
      fields: 'spreadsheetId,spreadsheetUrl',
    });
    const id = res.data.spreadsheetId;
    if (!id) throw new Error('Sheets API returned no spreadsheetId');
    return { spreadsheetId: id, url: res.data.spreadsheetUrl ?? spreadsheetUrl(id), created: true };
  } catch (err) {
    throw new SinkUnavailableError(`Unable to open spreadsheet "${title}": ${errorMessage(err)}`, err);
  }
}

/** Anyone with the link may edit; the named user gets an explicit writer grant. */
export async function shareSpreadsheet(clients: GoogleClients, spreadsheetId: string, email?: string): Promise<void> {
  try {
    await clients.drive.permissions.create({
      fileId: spreadsheetId,
      requestBody: { type: 'anyone', role: 'writer' },
    });
    if (email) {
      await clients.drive.permissions.create({
        fileId: spreadsheetId,
        requestBody: { type: 'user', role: 'writer', emailAddress: email },
        sendNotificationEmail: true,
      });
    }
  } catch (err) {
    throw new SinkUnavailableError(`Unable to share spreadsheet: ${errorMessage(err)}`, err);
  }
}
