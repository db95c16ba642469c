import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Split a comma-separated environment value into trimmed, non-empty entries
 */
function parseList(value: string | undefined, fallback: string): string[] {
    return (value || fallback)
        .split(',')
        .map(entry => entry.trim())
        .filter(entry => entry.length > 0);
}

/**
 * Anything other than "minimal" selects the full Airtable schema
 */
function parseSchema(value: string | undefined): 'full' | 'minimal' {
    return value === 'minimal' ? 'minimal' : 'full';
}

/**
 * Application configuration loaded from environment variables
 */
export const config = {
    // Node environment
    nodeEnv: process.env.NODE_ENV || 'development',
    isDev: process.env.NODE_ENV !== 'production',

    // Completion backend selection: 'openai' or 'gemini'
    ai: {
        provider: process.env.AI_PROVIDER || 'openai',
    },

    // OpenAI (candidate models are tried in order)
    openai: {
        apiKey: process.env.OPENAI_API_KEY || '',
        models: parseList(process.env.OPENAI_MODELS, 'gpt-4o,gpt-4o-mini'),
    },

    // Gemini
    gemini: {
        apiKey: process.env.GEMINI_API_KEY || '',
        models: parseList(process.env.GEMINI_MODELS, 'gemini-1.5-pro,gemini-1.5-flash'),
    },

    // Generation parameters
    generation: {
        temperature: parseFloat(process.env.GENERATION_TEMPERATURE || '0.7'),
        maxOutputTokens: parseInt(process.env.MAX_OUTPUT_TOKENS || '4000', 10),
    },

    // Workbook holding topics, keywords and links
    corpus: {
        filePath: process.env.EXCEL_FILE_PATH || 'data/Key Insights.xlsx',
    },

    // Batch runs
    batch: {
        defaultCount: parseInt(process.env.BATCH_DEFAULT_COUNT || '5', 10),
        outputDir: process.env.OUTPUT_DIR || 'generated_blogs',
    },

    // Airtable grid
    airtable: {
        apiKey: process.env.AIRTABLE_API_KEY || '',
        baseId: process.env.AIRTABLE_BASE_ID || '',
        tableName: process.env.AIRTABLE_TABLE_NAME || 'Table 1',
        schema: parseSchema(process.env.AIRTABLE_SCHEMA),
    },

    // Google Sheets
    sheets: {
        spreadsheetId: process.env.GOOGLE_SHEET_ID || '',
        credentialsFile: process.env.GOOGLE_CREDENTIALS_FILE || 'credentials.json',
    },

    // Logging
    logging: {
        level: process.env.LOG_LEVEL || 'info',
        dir: process.env.LOG_DIR || '',
    },
} as const;

/**
 * Validate required configuration
 */
export function validateConfig(): void {
    const aiProvider = config.ai.provider;
    if (aiProvider !== 'openai' && aiProvider !== 'gemini') {
        throw new Error(`Unsupported AI_PROVIDER: ${aiProvider}`);
    }
    if (aiProvider === 'openai' && !config.openai.apiKey) {
        throw new Error('OPENAI_API_KEY is required when AI_PROVIDER=openai');
    }
    if (aiProvider === 'gemini' && !config.gemini.apiKey) {
        throw new Error('GEMINI_API_KEY is required when AI_PROVIDER=gemini');
    }

    if (!Number.isInteger(config.batch.defaultCount) || config.batch.defaultCount < 0) {
        throw new Error('BATCH_DEFAULT_COUNT must be a non-negative integer');
    }

    const schema = process.env.AIRTABLE_SCHEMA;
    if (schema && schema !== 'full' && schema !== 'minimal') {
        throw new Error('AIRTABLE_SCHEMA must be "full" or "minimal"');
    }
}

export default config;
