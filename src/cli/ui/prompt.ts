/**
 * Ask a yes/no question. Defaults to no.
 */
export async function confirm(message: string): Promise<boolean> {
    const { default: inquirer } = await import('inquirer');
    const answers = await inquirer.prompt<{ confirmed: boolean }>([
        {
            type: 'confirm',
            name: 'confirmed',
            message,
            default: false,
        },
    ]);
    return answers.confirmed;
}
