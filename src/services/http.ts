import { errorMessage, toCollaboratorError, type CollaboratorService } from "../errors.js";

/**
 * Parse a collaborator's JSON body. A malformed body is a permanent failure;
 * a timeout or reset while reading it is transient.
 */
export async function readJson(response: Response, service: CollaboratorService, action: string): Promise<unknown> {
  try {
    return await response.json();
  } catch (error) {
    throw toCollaboratorError(service, error, action);
  }
}

/** Body of a failed response, for logs only. */
export async function readErrorDetails(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    return `(body unreadable: ${errorMessage(error)})`;
  }
}
