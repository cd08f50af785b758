export type RConstructor<T> = abstract new (...args: never[]) => T;

export abstract class RepositoryProvider {
    abstract get<T>(repositoryType: RConstructor<T>): T;
}

export class JsonlRepositoryProvider extends RepositoryProvider {
    private cache = new Map<RConstructor<unknown>, unknown>();
    private factories = new Map<RConstructor<unknown>, () => unknown>();

    register<T>(
        abstraction: RConstructor<T>,
        factory: () => T
    ): void {
        this.factories.set(abstraction, factory);
        this.cache.delete(abstraction);
    }

    get<T>(repositoryType: RConstructor<T>): T {
        let instance = this.cache.get(repositoryType);

        if (instance === undefined) {
            const factory = this.factories.get(repositoryType);

            if (!factory) {
                throw new Error(
                    `${repositoryType.name} not registered`
                );
            }

            instance = factory();
            this.cache.set(repositoryType, instance);
        }

        if (!(instance instanceof repositoryType)) {
            throw new Error(`Registered ${repositoryType.name} has the wrong type`);
        }
        return instance;
    }
}
