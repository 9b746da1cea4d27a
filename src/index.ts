import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import {
	CallToolRequestSchema,
	ListResourcesRequestSchema,
	ListToolsRequestSchema,
	ReadResourceRequestSchema,
	ListPromptsRequestSchema,
	GetPromptRequestSchema
} from '@modelcontextprotocol/sdk/types.js'
import dotenv from 'dotenv'
import { loadConfig } from './config.js'
import { createContext } from './context.js'
import { handleToolCall, readResource, RESOURCE_DEFINITIONS, TOOL_DEFINITIONS } from './tools.js'

// Load .env
dotenv.config()

const config = loadConfig()
const context = createContext(config)

const server = new Server(
	{
		name: config.serverName,
		version: config.serverVersion
	},
	{
		capabilities: {
			tools: {},
			resources: {},
			prompts: {}
		}
	}
)

server.setRequestHandler(ListToolsRequestSchema, async () => ({
	tools: TOOL_DEFINITIONS
}))

server.setRequestHandler(CallToolRequestSchema, async (request) => {
	const { name, arguments: args } = request.params
	return handleToolCall(context, name, args)
})

server.setRequestHandler(ListResourcesRequestSchema, async () => ({
	resources: RESOURCE_DEFINITIONS
}))

server.setRequestHandler(ReadResourceRequestSchema, async (request) => readResource(context, request.params.uri))

server.setRequestHandler(ListPromptsRequestSchema, async () => ({
	prompts: [
		{
			name: 'market_mood_brief',
			description: 'Short brief on the mood of today’s finance headlines',
			arguments: [
				{
					name: 'focus',
					description: 'Optional label to focus on: Positive, Negative or Neutral',
					required: false
				}
			]
		}
	]
}))

server.setRequestHandler(GetPromptRequestSchema, async (request) => {
	const { name, arguments: args } = request.params

	switch (name) {
		case 'market_mood_brief': {
			const focus = args?.focus
			return {
				description: 'Market mood brief',
				messages: [
					{
						role: 'user',
						content: {
							type: 'text',
							text: `Write a short brief on the mood of the latest Indian finance headlines.

1. Call finance_news${focus ? ` with sentiment "${focus}"` : ''} to get the scored headlines
2. Use the counts to say whether the overall mood leans positive or negative
3. Pick the three headlines that best explain that mood and link them
4. Mention any feed listed under warnings as unavailable

Output:
- Overall mood (one sentence)
- Key headlines
- Feeds that failed, if any`
						}
					}
				]
			}
		}

		default:
			throw new Error(`Unknown prompt: ${name}`)
	}
})

async function main() {
	const transport = new StdioServerTransport()
	await server.connect(transport)

	console.error('Finance headline MCP server started')
	console.error(`- Version: ${config.serverVersion}`)
	console.error(`- Classifier: ${context.classifier.name}`)
	console.error(`- Cache TTL: ${config.cacheTtlSeconds}s`)
	console.error(`- Sources: ${config.sources.map((source) => source.name).join(', ')}`)
}

process.on('unhandledRejection', (error) => {
	console.error('Unhandled rejection:', error)
	process.exit(1)
})

main().catch((error) => {
	console.error('Server failed to start:', error)
	process.exit(1)
})
