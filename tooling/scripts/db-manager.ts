#!/usr/bin/env tsx
import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import readline from 'readline';
import { TransactionRepository, type LedgerStats } from '@ledger/core';
import { dropLedgerSchema, withLedgerDatabase } from '@ledger/database';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const ROOT_DIR = path.resolve(__dirname, '../../');

type Action = 'init' | 'stats' | 'reset';

const VALID_ACTIONS: readonly Action[] = ['init', 'stats', 'reset'];

const ARGS = process.argv.slice(2);
const DATABASE_FLAG_INDEX = ARGS.indexOf('--database');
const DATABASE_INPUT = DATABASE_FLAG_INDEX !== -1 ? ARGS[DATABASE_FLAG_INDEX + 1] : undefined;
const DRY_RUN = ARGS.includes('--dry-run');
const ASSUME_YES = ARGS.includes('--yes');

function isAction(value: string | undefined): value is Action {
    return VALID_ACTIONS.some((action) => action === value);
}

async function confirm(message: string): Promise<boolean> {
    const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
    });

    return new Promise((resolve) => {
        rl.question(`${message} (y/N) `, (answer) => {
            rl.close();
            resolve(answer.toLowerCase() === 'y');
        });
    });
}

function loadEnv(filePath: string): Record<string, string> {
    const fullPath = path.resolve(ROOT_DIR, filePath);
    if (!fs.existsSync(fullPath)) {
        return {};
    }
    return dotenv.parse(fs.readFileSync(fullPath));
}

// --database wins, then the environment, then the API's .env file
function resolveDatabasePath(): string {
    const apiEnv = loadEnv('apps/api/.env');
    const configured = DATABASE_INPUT || process.env.DATABASE_PATH || apiEnv.DATABASE_PATH || 'ledger.db';
    return path.resolve(ROOT_DIR, configured);
}

function init(databasePath: string) {
    withLedgerDatabase(databasePath, (db) => new TransactionRepository(db).initialize());
    console.log(`Ledger ready at ${databasePath}`);
}

function stats(databasePath: string) {
    let result: LedgerStats;
    try {
        result = withLedgerDatabase(
            databasePath,
            (db) => new TransactionRepository(db).stats(),
            { readonly: true, fileMustExist: true }
        );
    } catch (error) {
        console.error(`Error: cannot read a ledger at ${databasePath}. Run "init" first.`);
        console.error(error instanceof Error ? error.message : error);
        process.exit(1);
    }

    console.log(`Ledger: ${databasePath}`);
    console.log(`Transactions: ${result.count}`);
    if (result.firstDate && result.lastDate) {
        console.log(`Dates: ${result.firstDate} .. ${result.lastDate}`);
    }
}

async function reset(databasePath: string) {
    if (!ASSUME_YES && !DRY_RUN) {
        const confirmed = await confirm(`⚠️  This will DELETE ALL TRANSACTIONS in ${databasePath}. Are you sure?`);
        if (!confirmed) {
            console.log('Aborted.');
            return;
        }
    }

    if (DRY_RUN) {
        console.log(`[dry run] would drop and recreate the ledger at ${databasePath}`);
        return;
    }

    withLedgerDatabase(databasePath, (db) => {
        dropLedgerSchema(db);
        new TransactionRepository(db).initialize();
    });
    console.log(`Ledger at ${databasePath} reset`);
}

async function main() {
    const action = ARGS[0];

    if (!isAction(action)) {
        console.error('Usage: tsx tooling/scripts/db-manager.ts <init|stats|reset> [--database <path>] [--dry-run] [--yes]');
        process.exit(1);
    }

    if (DATABASE_FLAG_INDEX !== -1 && !DATABASE_INPUT) {
        console.error('Error: --database flag provided but no path specified.');
        process.exit(1);
    }

    const databasePath = resolveDatabasePath();
    console.log(`\n=== Running ${action} ===`);

    switch (action) {
        case 'init':
            init(databasePath);
            break;
        case 'stats':
            stats(databasePath);
            break;
        case 'reset':
            await reset(databasePath);
            break;
    }
}

main().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
