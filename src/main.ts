#!/usr/bin/env node
import * as readline from 'readline';
import { Verdict } from './types';
import { InvalidCandidateError } from './errors';
import { parseCandidate } from './candidate';
import { classify } from './primeCalculator';

export function formatVerdict(n: bigint, verdict: Verdict): string {
    return `${n} is ${verdict}`;
}

export function evaluateInput(text: string): string {
    const n = parseCandidate(text);
    return formatVerdict(n, classify(n));
}

function promptForNumber(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): Promise<string> {
    const rl = readline.createInterface({ input, output });

    return new Promise((resolve) => {
        let answered = false;

        rl.question('Enter a number: ', (answer) => {
            answered = true;
            rl.close();
            resolve(answer);
        });

        // input ended before a full line arrived
        rl.once('close', () => {
            if (!answered) resolve('');
        });
    });
}

export async function main(
    argv: string[],
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout
): Promise<number> {
    const text = argv[2] ?? await promptForNumber(input, output);

    try {
        console.log(evaluateInput(text));
        return 0;
    } catch (err) {
        if (err instanceof InvalidCandidateError) {
            console.error(err.message);
            return 1;
        }
        throw err;
    }
}

if (require.main === module) {
    main(process.argv)
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error) => {
            console.error('Primality check failed:', error);
            process.exit(1);
        });
}
