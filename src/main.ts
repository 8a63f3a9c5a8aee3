#!/usr/bin/env node
import logger, { enableFileLog, setLoggerLevel } from './logger';
import { getConfig, loadConfig } from './config';
import { describeConfig, importLink } from './task';

async function main(args: string[]) {
    await loadConfig();
    setLoggerLevel(getConfig('log.level'));
    enableFileLog();

    const [link] = args;
    if (link) {
        await importLink(link);
        return;
    }
    const lines = await describeConfig();
    lines.forEach((line) => console.log(line));
}

main(process.argv.slice(2)).catch((e) => {
    logger.error(`Fail to run. ${e}`);
    process.exitCode = 1;
});
