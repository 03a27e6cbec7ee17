import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { isRecord } from '../common/types';

const NOTION_API_URL = 'https://api.notion.com/v1';

const richTextSchema = z.array(z.object({ plain_text: z.string().optional() }).passthrough());

const notionObjectSchema = z
  .object({
    object: z.string(),
    id: z.string(),
    url: z.string().optional(),
    title: richTextSchema.optional(),
    properties: z.record(z.unknown()).optional(),
  })
  .passthrough();

const searchResponseSchema = z.object({ results: z.array(notionObjectSchema) });

const tokenResponseSchema = z.object({
  access_token: z.string(),
  workspace_id: z.string().optional(),
  workspace_name: z.string().nullable().optional(),
});

export type NotionObject = z.infer<typeof notionObjectSchema>;
export type NotionTokenResponse = z.infer<typeof tokenResponseSchema>;

export type NotionProperty = Record<string, unknown>;

export interface CreatePageRequest {
  parent: { page_id: string } | { database_id: string };
  properties: Record<string, NotionProperty>;
  children?: Array<Record<string, unknown>>;
}

export interface CreateDatabaseRequest {
  parent: { type: 'page_id'; page_id: string };
  title: Array<Record<string, unknown>>;
  properties: Record<string, NotionProperty>;
}

/** A non-2xx answer from the Notion API. */
export class NotionApiError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'NotionApiError';
  }
}

export function textContent(content: string): Array<Record<string, unknown>> {
  return [{ type: 'text', text: { content } }];
}

/** Plain-text title of a page or database. */
export function titleOf(object: NotionObject): string {
  const join = (parts: z.infer<typeof richTextSchema>) => parts.map((part) => part.plain_text ?? '').join('');

  if (object.title) {
    return join(object.title);
  }
  for (const property of Object.values(object.properties ?? {})) {
    if (isRecord(property) && property.type === 'title') {
      const parsed = richTextSchema.safeParse(property.title);
      if (parsed.success) {
        return join(parsed.data);
      }
    }
  }
  return '';
}

@Injectable()
export class NotionClient {
  private readonly logger = new Logger(NotionClient.name);
  private readonly http: AxiosInstance;

  constructor(private readonly configService: ConfigService) {
    this.http = axios.create({
      baseURL: NOTION_API_URL,
      timeout: this.configService.get<number>('SERVICE_TIMEOUT_MS', 15000),
      headers: {
        'Notion-Version': this.configService.get<string>('NOTION_API_VERSION', '2022-06-28'),
        'Content-Type': 'application/json',
      },
    });
  }

  async search(token: string, query: string, kind: 'page' | 'database'): Promise<NotionObject[]> {
    const data = await this.request(token, 'POST', '/search', {
      query,
      filter: { property: 'object', value: kind },
      page_size: 10,
    });
    return searchResponseSchema.parse(data).results;
  }

  async createPage(token: string, body: CreatePageRequest): Promise<NotionObject> {
    return notionObjectSchema.parse(await this.request(token, 'POST', '/pages', body));
  }

  async createDatabase(token: string, body: CreateDatabaseRequest): Promise<NotionObject> {
    return notionObjectSchema.parse(await this.request(token, 'POST', '/databases', body));
  }

  /** OAuth code exchange; authenticates with the integration's client credentials. */
  async exchangeCode(code: string): Promise<NotionTokenResponse> {
    const clientId = this.configService.get<string>('NOTION_CLIENT_ID');
    const clientSecret = this.configService.get<string>('NOTION_CLIENT_SECRET');
    if (!clientId || !clientSecret) {
      throw new Error('Notion OAuth is not configured');
    }

    try {
      const response = await this.http.post<unknown>(
        '/oauth/token',
        {
          grant_type: 'authorization_code',
          code,
          redirect_uri: this.configService.get<string>('NOTION_REDIRECT_URL'),
        },
        { auth: { username: clientId, password: clientSecret } },
      );
      return tokenResponseSchema.parse(response.data);
    } catch (error) {
      throw this.toApiError(error);
    }
  }

  private async request(token: string, method: 'GET' | 'POST', url: string, data?: object): Promise<unknown> {
    try {
      const response = await this.http.request<unknown>({
        method,
        url,
        data,
        headers: { Authorization: `Bearer ${token}` },
      });
      return response.data;
    } catch (error) {
      throw this.toApiError(error);
    }
  }

  private toApiError(error: unknown): unknown {
    if (!axios.isAxiosError(error) || !error.response) {
      return error;
    }
    const body: unknown = error.response.data;
    const code = isRecord(body) && typeof body.code === 'string' ? body.code : 'unknown';
    const message = isRecord(body) && typeof body.message === 'string' ? body.message : error.message;
    this.logger.warn(`Notion API ${error.response.status} ${code}: ${message}`);
    return new NotionApiError(error.response.status, code, message);
  }
}
