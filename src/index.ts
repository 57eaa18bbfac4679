import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { env } from "./config/env";
import {
    CustomerIntelligenceService,
    loadModelBundle
} from "./modules/intelligence";
import { createIntelligenceTools } from "./tools/intelligence-tool-factory";
import { createLogger, setLogLevel } from "./utils/logger";

const logger = createLogger("server");

async function main(): Promise<void> {
    setLogLevel(env.logLevel);
    logger.info("Starting Customer Genome MCP Server...", {
        environment: env.nodeEnv
    });

    let intelligence: CustomerIntelligenceService;
    try {
        const models = await loadModelBundle(env.modelBundlePath);
        intelligence = new CustomerIntelligenceService(models, {
            similarityTopK: env.similarityTopK,
            maxBatchSize: env.maxBatchSize
        });
        logger.info("Model bundle loaded", {
            path: env.modelBundlePath,
            version: models.version
        });
    } catch (error) {
        logger.error("Fatal Error: could not load the model bundle", {
            error: error instanceof Error ? error.message : String(error)
        });
        process.exit(1);
    }

    const server = new McpServer(
        {
            name: "Customer Genome MCP Server",
            version: "1.0.0"
        },
        {
            capabilities: {
                tools: {}
            }
        }
    );

    createIntelligenceTools(intelligence).forEach((tool) => {
        server.tool(
            tool.name,
            tool.description,
            tool.inputSchema,
            async (args) => tool.handler(args)
        );
    });

    const transport = new StdioServerTransport();
    logger.info("Connecting server to transport...");
    await server.connect(transport);

    logger.info("Customer Genome MCP Server running on stdio");
}

main().catch((error) => {
    logger.error("Fatal error in main()", {
        error: error instanceof Error ? error.message : String(error)
    });
    process.exit(1);
});
