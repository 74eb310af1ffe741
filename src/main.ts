#!/usr/bin/env node
import { main } from '@/clipjoin';

await main();
