import readline from 'readline';

/** Asks on the terminal; only "yes" counts as consent. */
export async function confirm(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise(resolve => {
    rl.question(`\n${question} Only "yes" will be accepted.\nEnter a value: `, answer => {
      rl.close();
      resolve(answer.trim().toLowerCase() === 'yes');
    });
  });
}
