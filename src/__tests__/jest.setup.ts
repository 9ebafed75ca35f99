/**
 * Jest Global Setup
 *
 * Runs before every test file.
 *
 * `reflect-metadata` must be loaded before any tsyringe-decorated class is
 * evaluated. The environment block gives core/config.ts the required
 * capture settings so importing the app never trips its fail-fast exit;
 * dotenv leaves variables that are already set alone.
 */
import 'reflect-metadata';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_REQUEST_BODY = 'true';
process.env.LOG_REQUEST_BODY_MAX_SIZE = '1000';
process.env.LOG_RESPONSE_BODY = 'true';
process.env.LOG_RESPONSE_BODY_MAX_SIZE = '1000';
process.env.BODY_LIMIT = '10kb';
