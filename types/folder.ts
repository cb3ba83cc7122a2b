/**
 * A named grouping of releases in a user's collection.
 */
export interface Folder {
  id: number
  name: string
  count: number   // Number of releases the API reports for the folder
}
