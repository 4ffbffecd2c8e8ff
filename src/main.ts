#!/usr/bin/env node
import * as dotenv from 'dotenv';
import { AppConfig, loadConfig } from './config';
import { runDemos } from './demos';
import { describeError } from './domain/errors';

// 1. Load Config Early
dotenv.config();

// 2. Fail-Fast Validation
function readConfig(): AppConfig {
    try {
        return loadConfig(process.env);
    } catch (error) {
        console.error(`❌ STARTUP FATAL: ${describeError(error)}`);
        process.exit(1);
    }
}

runDemos(readConfig());
