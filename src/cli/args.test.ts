import { describe, expect, it } from 'vitest';
import { parseArgs } from './args.js';

describe('parseArgs', () => {
  it('reads the command and repeatable options', () => {
    const args = parseArgs([
      'evaluate',
      '--ground-truth',
      'refs',
      '--model',
      'XTTS=xtts/text',
      '--model=F5-TTS=f5tts/text',
      '--output',
      'out',
    ]);

    expect(args.command).toBe('evaluate');
    expect(args.groundTruth).toBe('refs');
    expect(args.models).toEqual([
      { name: 'XTTS', folder: 'xtts/text' },
      { name: 'F5-TTS', folder: 'f5tts/text' },
    ]);
    expect(args.output).toBe('out');
  });

  it('collects analysis files and the line limit', () => {
    const args = parseArgs(['analyze', '--file', 'a_wer.csv', '--file', 'b_wer.csv']);
    expect(args.files).toEqual(['a_wer.csv', 'b_wer.csv']);
    expect(parseArgs(['extract', '--num-lines', '5']).numLines).toBe(5);
  });

  it('rejects bad input', () => {
    expect(() => parseArgs(['evaluate', '--model', 'nofolder'])).toThrow('--model expects <name>=<folder>');
    expect(() => parseArgs(['analyze', '--output'])).toThrow('--output requires a value');
    expect(() => parseArgs(['extract', '--num-lines', '0'])).toThrow('--num-lines must be a positive integer');
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseArgs(['publish'])).toThrow('Unexpected argument: publish');
  });

  it('recognizes help without a command', () => {
    expect(parseArgs(['--help'])).toMatchObject({ help: true, command: undefined });
  });
});
