export type ActionDetails = Record<string, number | string | boolean>;

export interface ActionResult {
  success: boolean;
  error?: string;
  details: ActionDetails;
}

export function actionSucceeded(details: ActionDetails = {}): ActionResult {
  return { success: true, details };
}

export function actionFailed(error: string, details: ActionDetails = {}): ActionResult {
  return { success: false, error, details };
}
