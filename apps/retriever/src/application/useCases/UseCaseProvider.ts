export type SConstructor<T> = new (...args: never[]) => T;

export class UseCaseProvider {
    private cache = new Map<SConstructor<unknown>, unknown>();
    private factories = new Map<SConstructor<unknown>, () => unknown>();

    register<T>(
        serviceType: SConstructor<T>,
        factory: () => T
    ): void {
        this.factories.set(serviceType, factory);
        this.cache.delete(serviceType);
    }

    get<T>(serviceType: SConstructor<T>): T {
        let instance = this.cache.get(serviceType);

        if (instance === undefined) {
            const factory = this.factories.get(serviceType);

            if (!factory) {
                throw new Error(
                    `Service ${serviceType.name} not registered`
                );
            }

            instance = factory();
            this.cache.set(serviceType, instance);
        }

        if (!(instance instanceof serviceType)) {
            throw new Error(`Registered ${serviceType.name} has the wrong type`);
        }
        return instance;
    }
}
