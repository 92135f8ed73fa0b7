/**
 * Use Case Interface
 *
 * One application operation. Controllers and the CLI resolve use cases
 * from the container and call only `execute`.
 */
export interface IUseCase<TRequest, TResult> {
  execute(request: TRequest): Promise<TResult>;
}
