#!/usr/bin/env tsx
/**
 * bin/keel.ts — Entry point for the `keel` CLI command.
 *
 * keel compile web1.example.com --stats
 * keel facts web1.example.com --json
 * keel parse manifests/site.pp
 */

const { program } = await import('../commands/index.js')
await program.parseAsync()
