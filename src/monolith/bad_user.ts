/**
 * Counter-example: one class that persists, validates and formats itself.
 * Every one of those concerns is a separate reason for this class to change.
 * The decomposed equivalent is UserService and its collaborators.
 */
export class BadUser {
    constructor(
        public readonly id: string,
        public name: string,
        public email: string,
        public isActive: boolean = true
    ) { }

    // Persistence
    saveToDatabase(): void {
        console.log(`User: Saving user ${this.name} (${this.id}) to database...`);
        console.log('User: User saved to DB successfully.');
    }

    // Validation
    isValid(): boolean {
        console.log(`User: Validating user ${this.name} (${this.id})...`);
        if (!this.name.trim()) {
            console.log('Validation failed: Name cannot be blank.');
            return false;
        }
        if (!this.email.includes('@') || !this.email.includes('.')) {
            console.log('Validation failed: Invalid email format.');
            return false;
        }
        console.log('User: Validation successful.');
        return true;
    }

    // Presentation
    formatForDisplay(): string {
        console.log(`User: Formatting user ${this.name} (${this.id}) for display...`);
        const status = this.isActive ? 'Active' : 'Inactive';
        return `User ID: ${this.id}\nName: ${this.name}\nEmail: ${this.email}\nStatus: ${status}`;
    }
}
