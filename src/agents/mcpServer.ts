import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig } from '../config/load.js';
import { JsonLogger } from '../core/logger.js';
import { createGatewayFromConfig } from '../exchanges/binance/adapter.js';
import { EnvSecretsProvider } from '../secrets/envFallback.js';
import { loadExchangeCredentials } from '../secrets/provider.js';
import { createGatewayTools, type GatewayTool } from './tools.js';

const registerGatewayTools = (server: McpServer, tools: GatewayTool[]): void => {
  for (const tool of tools) {
    server.tool(tool.name, tool.description, tool.shape, async (args) => ({
      content: [{ type: 'text' as const, text: await tool.invoke(args) }]
    }));
  }
};

async function main() {
  const config = loadConfig();
  // stdout carries the protocol; logs go to stderr.
  const logger = new JsonLogger(config.logLevel, process.stderr);
  const secrets = new EnvSecretsProvider(process.env);

  // Credentials are resolved per tool call.
  const tools = createGatewayTools(async () =>
    createGatewayFromConfig(config, await loadExchangeCredentials(secrets), logger)
  );

  const server = new McpServer({ name: 'futures-order-gateway', version: '0.1.0' });
  registerGatewayTools(server, tools);

  await server.connect(new StdioServerTransport());
  logger.info('tool server listening on stdio', {
    tools: tools.map((t) => t.name),
    testnet: config.exchange.testnet
  });
}

main().catch((error) => {
  console.error('Failed to start tool server:', error);
  process.exit(1);
});
