import type { z } from 'zod';
import type {
  ClientPassword,
  Consumer,
  HttpRequest,
  OAuthV1Token,
  Signer,
  TokenSigner,
  TypedResponse,
  UserAgent,
} from '@authwire/models';
import {
  decoders as decoderPair,
  directExecutor,
  executeRequest,
  FetchTransport,
  jsonDecoder,
  MediaTypes,
  plainTextDecoder,
  unsigned,
  type Decoders,
  type ExecuteOptions,
  type HttpTransport,
  type RequestContext,
  type ResponseError,
  type Result,
  type Task,
  type TaskExecutor,
} from '@authwire/core';
import type { PreparedRequest } from '../grants/prepared-request.js';
import { bindSigner, type SignOptions } from '../signers/apply-signer.js';
import { clientPasswordSigner, disabledSigner, oauthV1Signer } from '../signers/signers.js';
import { formatUserAgent } from './user-agent.js';

export type Outcome<T> = Result<TypedResponse<T>, ResponseError>;

export interface AuthClientOptions {
  userAgent: UserAgent;
  signer: Signer;
  /** Defaults to a {@link FetchTransport} without timeout */
  transport?: HttpTransport;
  /** Defaults to {@link directExecutor} */
  executor?: TaskExecutor;
  signOptions?: SignOptions;
}

export type AuthClientExtras = Omit<AuthClientOptions, 'userAgent' | 'signer'>;

/**
 * Binds one {@link Signer} and a `User-Agent` to a transport.
 *
 * Instances are immutable; {@link AuthClient.withSigner} returns a new client
 * sharing transport and executor. Nothing is retried.
 *
 * @example
 * ```typescript
 * const client = AuthClient.clientPassword(
 *   { appName: 'demo', appVersion: '1.0' },
 *   { clientId: 'abc', clientSecret: 'test-secret' },
 * );
 * const token = await client.send(
 *   ClientCredentialsGrant.accessTokenRequest('https://auth.example.com/token', client.clientPassword()),
 * );
 * ```
 */
export class AuthClient {
  public readonly userAgent: UserAgent;
  public readonly signer: Signer;
  private readonly transport: HttpTransport;
  private readonly executor: TaskExecutor;
  private readonly signOptions: SignOptions;

  public constructor(options: AuthClientOptions) {
    this.userAgent = options.userAgent;
    this.signer = options.signer;
    this.transport = options.transport ?? new FetchTransport();
    this.executor = options.executor ?? directExecutor;
    this.signOptions = options.signOptions ?? {};
  }

  public static disabled(userAgent: UserAgent, extras: AuthClientExtras = {}): AuthClient {
    return new AuthClient({ ...extras, userAgent, signer: disabledSigner });
  }

  public static oauthV1(
    userAgent: UserAgent,
    consumer: Consumer,
    token?: OAuthV1Token,
    extras: AuthClientExtras = {},
  ): AuthClient {
    return new AuthClient({ ...extras, userAgent, signer: oauthV1Signer(consumer, token) });
  }

  public static clientPassword(
    userAgent: UserAgent,
    clientPassword: ClientPassword,
    extras: AuthClientExtras = {},
  ): AuthClient {
    return new AuthClient({ ...extras, userAgent, signer: clientPasswordSigner(clientPassword) });
  }

  public static accessToken(
    userAgent: UserAgent,
    signer: TokenSigner,
    extras: AuthClientExtras = {},
  ): AuthClient {
    return new AuthClient({ ...extras, userAgent, signer });
  }

  /**
   * Client password of a `client-password` client, for grant requests.
   * @throws {TypeError} for any other signer
   */
  public clientPassword(): ClientPassword {
    if (this.signer.type !== 'client-password') {
      throw new TypeError(`Client is signed with '${this.signer.type}', not a client password`);
    }
    return this.signer.clientPassword;
  }

  public withSigner(signer: Signer): AuthClient {
    return new AuthClient({
      userAgent: this.userAgent,
      signer,
      transport: this.transport,
      executor: this.executor,
      signOptions: this.signOptions,
    });
  }

  /**
   * Lazy signed request; runs each time the task is called.
   */
  public task<T>(
    request: HttpRequest,
    decoders: Decoders<T>,
    options?: ExecuteOptions,
  ): Task<Outcome<T>> {
    return executeRequest(
      this.context(bindSigner(this.signer, this.signOptions)),
      request,
      decoders,
      options,
    );
  }

  public execute<T>(
    request: HttpRequest,
    decoders: Decoders<T>,
    options?: ExecuteOptions,
  ): Promise<Outcome<T>> {
    return this.executor.run(this.task(request, decoders, options));
  }

  /**
   * Runs a request that is already signed, such as a grant's token request.
   * The client's own signer is not applied.
   */
  public send<T>(prepared: PreparedRequest<T>, options?: ExecuteOptions): Promise<Outcome<T>> {
    return this.executor.run(
      executeRequest(this.context(unsigned), prepared.request, prepared.decoders, options),
    );
  }

  public getJson<S extends z.ZodTypeAny>(
    uri: string,
    schema: S,
    options?: ExecuteOptions,
  ): Promise<Outcome<z.output<S>>> {
    return this.execute(
      { method: 'GET', uri, headers: {} },
      decoderPair({ success: jsonDecoder(schema) }),
      options,
    );
  }

  public getPlainText(uri: string, options?: ExecuteOptions): Promise<Outcome<string>> {
    return this.execute(
      { method: 'GET', uri, headers: {} },
      decoderPair({ success: plainTextDecoder() }),
      options,
    );
  }

  public postJson<S extends z.ZodTypeAny>(
    uri: string,
    body: unknown,
    schema: S,
    options?: ExecuteOptions,
  ): Promise<Outcome<z.output<S>>> {
    return this.execute(
      {
        method: 'POST',
        uri,
        headers: { 'Content-Type': MediaTypes.JSON },
        body: JSON.stringify(body),
      },
      decoderPair({ success: jsonDecoder(schema) }),
      options,
    );
  }

  /**
   * Form-encoded POST. Form fields take part in OAuth 1.0a signatures.
   */
  public postForm<T>(
    uri: string,
    fields: Readonly<Record<string, string>>,
    decoders: Decoders<T>,
    options?: ExecuteOptions,
  ): Promise<Outcome<T>> {
    return this.execute(
      {
        method: 'POST',
        uri,
        headers: { 'Content-Type': MediaTypes.FORM },
        body: new URLSearchParams(fields).toString(),
      },
      decoders,
      options,
    );
  }

  private context(signer: RequestContext['signer']): RequestContext {
    return {
      transport: this.transport,
      signer,
      defaultHeaders: { 'User-Agent': formatUserAgent(this.userAgent) },
    };
  }
}
