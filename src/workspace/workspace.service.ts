import { Injectable, Logger } from '@nestjs/common';
import { ArgsOf } from '../common/function-schemas';
import { FunctionCallResult, UserContext, failure, success } from '../common/types';
import { UsersService } from '../users/users.service';
import { NotionApiError, NotionClient, NotionProperty, textContent, titleOf } from './notion.client';

const NOTION_ID = /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;
const TITLE_KEYS = ['name', 'title', 'task'];
const COLUMN_TYPES = new Set(['title', 'rich_text', 'number', 'checkbox', 'date', 'select', 'multi_select', 'url', 'email', 'phone_number']);

type ParentKind = 'page' | 'database';

function columnProperty(type: string): NotionProperty {
  const normalized = type.trim().toLowerCase().replace(/[\s-]+/g, '_');
  const columnType = COLUMN_TYPES.has(normalized) ? normalized : 'rich_text';
  return { [columnType]: {} };
}

@Injectable()
export class WorkspaceService {
  private readonly logger = new Logger(WorkspaceService.name);

  constructor(
    private readonly notion: NotionClient,
    private readonly users: UsersService,
  ) {}

  async createNote(context: UserContext, args: ArgsOf<'createExternalNote'>): Promise<FunctionCallResult> {
    const token = this.tokenFor(context);
    if (!token) {
      return failure('Notion account not linked or token missing.');
    }

    try {
      const parentId = await this.resolve(token, args.parent_reference, 'page');
      if (!parentId) {
        return failure(`Could not find a Notion page named "${args.parent_reference}".`);
      }

      const page = await this.notion.createPage(token, {
        parent: { page_id: parentId },
        properties: { title: { title: textContent(args.title) } },
        children: args.content
          ? [{ object: 'block', type: 'paragraph', paragraph: { rich_text: textContent(args.content) } }]
          : [],
      });
      this.logger.log(`📝 Note page ${page.id} created for user ${context.userId}`);

      return success(`Note "${args.title}" created in Notion.`, { page_id: page.id, page_url: page.url ?? null });
    } catch (error) {
      return this.fromApiError(error, `the parent page (${args.parent_reference})`);
    }
  }

  async createTable(context: UserContext, args: ArgsOf<'createExternalTable'>): Promise<FunctionCallResult> {
    const token = this.tokenFor(context);
    if (!token) {
      return failure('Notion account not linked or token missing.');
    }

    const columns = Object.entries(args.column_schema);
    if (columns.length === 0) {
      return failure('Please define at least one column for the table.');
    }
    if (columns.some(([name]) => name === 'title')) {
      return failure("Do not include 'title' in the column schema; the title column is handled separately.");
    }

    const properties: Record<string, NotionProperty> = {};
    for (const [name, type] of columns) {
      properties[name] = columnProperty(type);
    }
    if (!Object.values(properties).some((property) => 'title' in property)) {
      properties.Name = { title: {} };
    }

    try {
      const parentId = await this.resolve(token, args.parent_reference, 'page');
      if (!parentId) {
        return failure(`Could not find a Notion page named "${args.parent_reference}".`);
      }

      const database = await this.notion.createDatabase(token, {
        parent: { type: 'page_id', page_id: parentId },
        title: textContent(args.title),
        properties,
      });
      this.logger.log(`📊 Database ${database.id} created for user ${context.userId}`);

      return success(`Table "${args.title}" created in Notion with columns: ${Object.keys(properties).join(', ')}.`, {
        database_id: database.id,
        database_url: database.url ?? null,
      });
    } catch (error) {
      return this.fromApiError(error, `the parent page (${args.parent_reference})`);
    }
  }

  async addTableRow(context: UserContext, args: ArgsOf<'addExternalTableRow'>): Promise<FunctionCallResult> {
    const token = this.tokenFor(context);
    if (!token) {
      return failure('Notion account not linked or token missing.');
    }

    const entries = Object.entries(args.row_data);
    if (entries.length === 0) {
      return failure('No data provided for the new row.');
    }
    const titleKey = entries.map(([key]) => key).find((key) => TITLE_KEYS.includes(key.toLowerCase()));
    if (!titleKey) {
      return failure('Could not identify the title column for the row. Include a "Name", "Title" or "Task" value.');
    }

    const properties: Record<string, NotionProperty> = {};
    for (const [key, value] of entries) {
      properties[key] = key === titleKey ? { title: textContent(String(value)) } : { rich_text: textContent(String(value)) };
    }

    try {
      const databaseId = await this.resolve(token, args.table_reference, 'database');
      if (!databaseId) {
        return failure(`Could not find a Notion table named "${args.table_reference}".`);
      }

      const page = await this.notion.createPage(token, { parent: { database_id: databaseId }, properties });
      this.logger.log(`➕ Row ${page.id} added to database ${databaseId} for user ${context.userId}`);

      return success(`Row "${String(args.row_data[titleKey])}" added to the Notion table.`, {
        page_id: page.id,
        page_url: page.url ?? null,
      });
    } catch (error) {
      return this.fromApiError(error, `the table (${args.table_reference})`);
    }
  }

  private tokenFor(context: UserContext): string | undefined {
    return this.users.findById(context.userId)?.workspaceToken;
  }

  /** An id is used as given; anything else must match a title exactly, ignoring case. */
  private async resolve(token: string, reference: string, kind: ParentKind): Promise<string | null> {
    const trimmed = reference.trim();
    if (NOTION_ID.test(trimmed)) {
      return trimmed;
    }
    const candidates = await this.notion.search(token, trimmed, kind);
    const match = candidates.find((candidate) => titleOf(candidate).trim().toLowerCase() === trimmed.toLowerCase());
    return match?.id ?? null;
  }

  private fromApiError(error: unknown, target: string): FunctionCallResult {
    if (!(error instanceof NotionApiError)) {
      throw error;
    }
    if (error.status === 404) {
      return failure(`Could not find ${target} in Notion. Does it exist, and is it shared with the integration?`);
    }
    if (error.status === 401 || error.status === 403) {
      return failure("I don't have permission to do that in your Notion. Please check the integration permissions.");
    }
    if (error.status === 400) {
      return failure(`Notion rejected the request: ${error.message}`);
    }
    return failure(`Notion API error: ${error.code}`);
  }
}
