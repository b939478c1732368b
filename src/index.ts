import { createApp, createDependencies } from './presentation/app';
import { loadConfig, validateConfig } from './config';

async function main(): Promise<void> {
    console.log('🎞️ Frame Template Renderer - starting...');

    try {
        // 1. Load and validate configuration
        console.log('📋 Loading configuration...');
        const config = loadConfig();

        console.log('🔍 Validating configuration...');
        const configErrors = validateConfig(config);

        if (configErrors.length > 0) {
            console.error('❌ Configuration validation failed:');
            configErrors.forEach((error) => console.error(`  - ${error}`));
            process.exit(1);
        }

        // 2. Check the default template, but keep running without it
        const { templates, frameService } = createDependencies(config);
        try {
            const resolved = await templates.resolveTemplatePath(config.frame.defaultTemplate);
            console.log(`✅ Default template: ${config.frame.defaultTemplate} -> ${resolved}`);
        } catch (error) {
            console.warn(`⚠️  Configured default template '${config.frame.defaultTemplate}' not found: ${error instanceof Error ? error.message : String(error)}`);
        }

        // 3. Create and start the app
        const app = createApp(config, frameService);

        app.listen(config.port, () => {
            console.log(`✅ Server running on http://localhost:${config.port}`);
            console.log(`   Environment: ${config.environment}`);
            console.log(`   Templates: ${config.frame.templatesDir} (custom: ${config.frame.customTemplatesDir})`);
        });
    } catch (error) {
        console.error('💥 Fatal error during bootstrap:', error);
        process.exit(1);
    }
}

main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
});
