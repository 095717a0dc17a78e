#!/usr/bin/env node
import { ForumSearchServer } from "./server.js";

const server = new ForumSearchServer();
server.run().catch(console.error);
