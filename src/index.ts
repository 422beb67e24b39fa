import { createApp } from './app';
import { loadConfig } from './config';

/**
 * Main application entry point.
 */
async function main() {
    // Throws and prevents startup if the environment is malformed.
    const config = loadConfig(process.env);
    const app = createApp({ config });

    app.listen(config.port, () => {
        console.log(`Clicker server (Express) listening on :${config.port}`);
    });
}

main().catch(error => {
    console.error(error);
    process.exitCode = 1;
});
