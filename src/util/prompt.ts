import * as readline from 'readline';

const createReadlineInterface = (): readline.Interface => {
    return readline.createInterface({
        input: process.stdin,
        output: process.stdout,
    });
};

const askQuestion = (rl: readline.Interface, question: string): Promise<string> => {
    return new Promise((resolve) => {
        rl.question(question, (answer) => {
            resolve(answer.trim());
        });
    });
};

export const isAffirmative = (answer: string): boolean => ['y', 'yes'].includes(answer.trim().toLowerCase());

/** Asks a yes/no question on the terminal; anything but y/yes is a no. */
export const confirm = async (question: string): Promise<boolean> => {
    const rl = createReadlineInterface();
    try {
        return isAffirmative(await askQuestion(rl, `${question} [y/N] `));
    } finally {
        rl.close();
    }
};
