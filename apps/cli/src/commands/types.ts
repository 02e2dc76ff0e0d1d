import type { Command } from 'commander';
import type { TaskApiClient } from '../client.js';

/** Resolves the API client for a command, honouring global options */
export type ClientFactory = (cmd: Command) => TaskApiClient;
