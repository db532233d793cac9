import type Anthropic from '@anthropic-ai/sdk';
import { RELATION_KINDS, SCRAPING_CONFIG } from '../constants';
import { OracleError } from '../errors';
import { RelationsPayloadSchema } from '../schemas';
import type { FamilyRelation } from '../types';

export interface RelationExtractor {
  extract(text: string): Promise<FamilyRelation[]>;
}

// The slice of the Anthropic client this module calls
export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming
    ): Promise<Pick<Anthropic.Message, 'content' | 'stop_reason'>>;
  };
}

export const RELATIONS_TOOL_NAME = 'record_political_relations';

export const RELATIONS_SYSTEM_PROMPT = `Your role is to inspect the contents of a politician's Wikipedia page and extract information
about any family members who were either a member of parliament, a local councillor, or otherwise a politician.
Record every such family member with the ${RELATIONS_TOOL_NAME} tool. Record an empty list when there are none.`;

export const RELATIONS_TOOL: Anthropic.Tool = {
  name: RELATIONS_TOOL_NAME,
  description:
    'Record family members who were either a member of parliament, a local councillor, or otherwise a politician.',
  input_schema: {
    type: 'object',
    properties: {
      relations: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            name: { type: 'string', description: 'Name of the family member' },
            role: { type: 'string', description: 'Political role of the family member' },
            relation: {
              type: 'string',
              enum: [...RELATION_KINDS],
              description: 'Relationship of the family member to the politician',
            },
            party: {
              type: ['string', 'null'],
              description: 'Political party of the family member',
            },
          },
          required: ['name', 'role', 'relation'],
        },
      },
    },
    required: ['relations'],
  },
};

/**
 * Validate the tool input the model produced. Anything off-schema is an OracleError.
 */
export function parseRelationsPayload(input: unknown): FamilyRelation[] {
  const parsed = RelationsPayloadSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '<root>'}: ${issue.message}` : 'invalid';
    throw new OracleError(`Malformed relations from model (${where})`, { cause: parsed.error });
  }
  return parsed.data.relations;
}

export interface AnthropicRelationExtractorOptions {
  model?: string;
  maxTokens?: number;
}

export class AnthropicRelationExtractor implements RelationExtractor {
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(
    private readonly client: MessagesClient,
    options: AnthropicRelationExtractorOptions = {}
  ) {
    this.model = options.model ?? SCRAPING_CONFIG.RELATIONS.MODEL;
    this.maxTokens = options.maxTokens ?? SCRAPING_CONFIG.RELATIONS.MAX_TOKENS;
  }

  async extract(text: string): Promise<FamilyRelation[]> {
    let message: Pick<Anthropic.Message, 'content' | 'stop_reason'>;
    try {
      message = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        system: RELATIONS_SYSTEM_PROMPT,
        tools: [RELATIONS_TOOL],
        tool_choice: { type: 'tool', name: RELATIONS_TOOL_NAME },
        messages: [{ role: 'user', content: text }],
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new OracleError(`Relation extraction request failed: ${reason}`, { cause: error });
    }

    const toolUse = message.content.find(
      (block): block is Anthropic.ToolUseBlock =>
        block.type === 'tool_use' && block.name === RELATIONS_TOOL_NAME
    );
    if (!toolUse) {
      throw new OracleError(
        `Model returned no ${RELATIONS_TOOL_NAME} call (stop reason: ${message.stop_reason})`
      );
    }

    return parseRelationsPayload(toolUse.input);
  }
}
