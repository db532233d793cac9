export {
  AnthropicRelationExtractor,
  parseRelationsPayload,
  RELATIONS_SYSTEM_PROMPT,
  RELATIONS_TOOL,
  RELATIONS_TOOL_NAME,
  type AnthropicRelationExtractorOptions,
  type MessagesClient,
  type RelationExtractor,
} from './oracle';
