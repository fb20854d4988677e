import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, loadTournamentConfig } from './config.js';
import { logger } from './logger.js';

logger.setConsoleOutputEnabled(false);

function writeTemp(name: string, contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'arena-config-'));
  const file = path.join(dir, name);
  fs.writeFileSync(file, contents);
  return file;
}

test('loadConfig: parses YAML and fills defaults', () => {
  const file = writeTemp(
    'game.yaml',
    ['game: poker', 'options:', '  big_blind: 50', 'players:', '  - name: Alice', '  - name: Bob', '    model: anthropic/claude-sonnet-4'].join('\n')
  );
  const config = loadConfig(file);
  assert.equal(config.game, 'poker');
  assert.equal(config.max_rounds, 50);
  assert.equal(config.max_attempts, 2);
  assert.equal(config.decision_timeout_ms, 60_000);
  assert.equal(config.log_thoughts, false);
  assert.equal(config.seed, undefined);
  assert.deepEqual(config.options, { big_blind: 50 });
  assert.equal(config.players[0]?.model, 'openai/gpt-4o');
  assert.equal(config.players[0]?.temperature, 0.7);
  assert.equal(config.players[1]?.model, 'anthropic/claude-sonnet-4');
});

test('loadConfig: rejects an unknown game', () => {
  const file = writeTemp('bad.yaml', ['game: checkers', 'players:', '  - name: A', '  - name: B'].join('\n'));
  assert.throws(() => loadConfig(file));
});

test('loadConfig: rejects a single player', () => {
  const file = writeTemp('solo.yaml', ['game: chess', 'players:', '  - name: A'].join('\n'));
  assert.throws(() => loadConfig(file));
});

test('loadConfig: missing file throws', () => {
  assert.throws(() => loadConfig(path.join(os.tmpdir(), 'does-not-exist-arena.yaml')), /ENOENT/);
});

test('loadTournamentConfig: parses models and defaults', () => {
  const file = writeTemp('t.yaml', ['game: chess', 'models:', '  - openai/gpt-4o', '  - anthropic/claude-sonnet-4', 'seed: 9'].join('\n'));
  const config = loadTournamentConfig(file);
  assert.deepEqual(config.models, ['openai/gpt-4o', 'anthropic/claude-sonnet-4']);
  assert.equal(config.games_per_matchup, 1);
  assert.equal(config.players_per_game, undefined);
  assert.equal(config.ratings_file, 'ratings.json');
  assert.equal(config.seed, 9);
});
