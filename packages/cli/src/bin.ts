#!/usr/bin/env node
import dotenv from 'dotenv';
import { executeCli } from './main.js';

dotenv.config();

process.exitCode = await executeCli(process.argv.slice(2), { env: process.env, signals: process });
